import type { ReportFormat } from "../types/config.js";

export type ReportLevel = "error" | "warn" | "info";

export type ReportEvent = {
  level: ReportLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export interface Reporter {
  report(event: ReportEvent): void;
}

export type ReportStream = { write(chunk: string): unknown };

export const silentReporter: Reporter = {
  report() {},
};

/**
 * Line-oriented reporter. `jsonl` writes every event as one JSON line to
 * `out`; `human` writes the message alone, errors and warnings to `err`.
 */
export function createReporter(
  format: ReportFormat,
  streams: { out: ReportStream; err: ReportStream } = { out: process.stdout, err: process.stderr },
): Reporter {
  if (format === "jsonl") {
    return {
      report(event) {
        streams.out.write(JSON.stringify(event) + "\n");
      },
    };
  }
  return {
    report(event) {
      const target = event.level === "info" ? streams.out : streams.err;
      target.write(event.message + "\n");
    },
  };
}

/** Collects events in memory. */
export class MemoryReporter implements Reporter {
  readonly events: ReportEvent[] = [];

  report(event: ReportEvent): void {
    this.events.push(event);
  }

  codes(): string[] {
    return this.events.map((e) => e.code);
  }
}
