import type { Trace } from "../types/trace.js";

/**
 * A capability that captures a trace around a code region.
 *
 * Started and stopped once per run. `snapshot` is only called between
 * `start` and `stop` and must not interrupt the ongoing capture.
 */
export interface TraceMonitor {
  /** Unique among the monitors of one test; keys the run's traces. */
  readonly name: string;
  /** Appended to `{testName}_{index}[_{tag}]` to form the artifact file name. */
  readonly fileSuffix: string;
  start(): void | Promise<void>;
  stop(): Trace | Promise<Trace>;
  snapshot(tag: string): Trace | Promise<Trace>;
}

/** Counts janky frames over the transition window. */
export interface FrameStatsMonitor {
  start(): void | Promise<void>;
  /** Number of janky frames since `start`. */
  stop(): number | Promise<number>;
}

/** Waits for the device to settle. Called by phase commands, never by the runner. */
export interface StateSyncHelper {
  waitForIdle(): void | Promise<void>;
}
