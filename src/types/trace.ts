/** What monitors capture and what lands on disk. */
export type TraceEntry = {
  /** Milliseconds since the monitor started. */
  timestamp: number;
  state: unknown;
};

export type Trace = {
  monitor: string;
  entries: readonly TraceEntry[];
};

/** A trace that has been written under the output directory. */
export type TraceArtifact = {
  monitor: string;
  path: string;
  sha256: string;
  trace: Trace;
};

/** Monitor name → artifact. */
export type TraceSet = ReadonlyMap<string, TraceArtifact>;

export type Run = {
  index: number;
  traces: TraceSet;
  /** Tag name → snapshots taken by every running monitor. */
  tags: ReadonlyMap<string, TraceSet>;
  /** Null when no frame-stats monitor was configured. */
  jankyFrames: number | null;
  error: Error | null;
};
