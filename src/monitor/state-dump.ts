import type { Trace, TraceEntry } from "../types/trace.js";
import type { TraceMonitor } from "./monitor.js";

export type StateProvider = () => unknown | Promise<unknown>;

/**
 * Samples a state provider into a trace: once on start, once per `sample()`,
 * once per tag and once on stop. Timestamps are relative to `start`.
 */
export class StateDumpMonitor implements TraceMonitor {
  readonly fileSuffix: string;
  private entries: TraceEntry[] = [];
  private startedAt: number | null = null;

  constructor(
    readonly name: string,
    private readonly provider: StateProvider,
    private readonly clock: () => number = Date.now,
  ) {
    this.fileSuffix = `_${name}.json`;
  }

  async start(): Promise<void> {
    if (this.startedAt !== null) {
      throw new Error(`Monitor ${this.name} is already running`);
    }
    this.entries = [];
    this.startedAt = this.clock();
    await this.sample();
  }

  /** Append one entry to the running capture. */
  async sample(): Promise<TraceEntry> {
    const startedAt = this.requireRunning();
    const state = await this.provider();
    const entry: TraceEntry = { timestamp: this.clock() - startedAt, state };
    this.entries.push(entry);
    return entry;
  }

  async snapshot(_tag: string): Promise<Trace> {
    const entry = await this.sample();
    return { monitor: this.name, entries: [entry] };
  }

  /** Always leaves the monitor stopped, even when the final sample fails. */
  async stop(): Promise<Trace> {
    try {
      await this.sample();
      return { monitor: this.name, entries: this.entries };
    } finally {
      this.entries = [];
      this.startedAt = null;
    }
  }

  isRunning(): boolean {
    return this.startedAt !== null;
  }

  private requireRunning(): number {
    if (this.startedAt === null) {
      throw new Error(`Monitor ${this.name} is not running`);
    }
    return this.startedAt;
  }
}
