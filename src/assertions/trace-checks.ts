import type { AssertionViolation, RunSubject } from "../types/assertion.js";
import type { Trace, TraceEntry } from "../types/trace.js";

export type StatePredicate = (state: unknown, entry: TraceEntry) => boolean;

/** Trace of `monitor` in the subject, or a violation saying it is missing. */
export function traceOf(subject: RunSubject, monitor: string): Trace | AssertionViolation {
  const artifact = subject.traces.get(monitor);
  if (!artifact) {
    return { message: `No trace captured by monitor ${monitor}` };
  }
  return artifact.trace;
}

function isTrace(value: Trace | AssertionViolation): value is Trace {
  return "entries" in value;
}

/** Every entry of the monitor's trace must satisfy `predicate`. */
export function everyEntry(monitor: string, predicate: StatePredicate, description: string) {
  return (subject: RunSubject): AssertionViolation | null => {
    const trace = traceOf(subject, monitor);
    if (!isTrace(trace)) return trace;
    const bad = trace.entries.find((entry) => !predicate(entry.state, entry));
    if (!bad) return null;
    return { message: `${monitor}: expected ${description}`, timestamp: bad.timestamp };
  };
}

/** No entry of the monitor's trace may satisfy `predicate`. */
export function noEntry(monitor: string, predicate: StatePredicate, description: string) {
  return everyEntry(monitor, (state, entry) => !predicate(state, entry), `never ${description}`);
}

/** The final entry must satisfy `predicate`. */
export function lastEntry(monitor: string, predicate: StatePredicate, description: string) {
  return (subject: RunSubject): AssertionViolation | null => {
    const trace = traceOf(subject, monitor);
    if (!isTrace(trace)) return trace;
    const last = trace.entries.at(-1);
    if (!last) return { message: `${monitor}: trace is empty` };
    if (predicate(last.state, last)) return null;
    return { message: `${monitor}: expected ${description} at the end`, timestamp: last.timestamp };
  };
}

/**
 * Cross-run check: `select` must yield the same value for every run.
 * Values are compared by their JSON form.
 */
export function sameAcrossRuns(monitor: string, select: (trace: Trace) => unknown, description: string) {
  return (subjects: readonly RunSubject[]): AssertionViolation | null => {
    let expected: string | undefined;
    for (const subject of subjects) {
      const trace = traceOf(subject, monitor);
      if (!isTrace(trace)) return { ...trace, runIndex: subject.run.index };
      const actual = JSON.stringify(select(trace));
      if (expected === undefined) {
        expected = actual;
      } else if (actual !== expected) {
        return {
          message: `${monitor}: ${description} differs between runs (${expected} vs ${actual})`,
          runIndex: subject.run.index,
        };
      }
    }
    return null;
  };
}
