import type { Run, TraceSet } from "./trace.js";

/** What a predicate returns when the captured state breaks its expectation. */
export type AssertionViolation = {
  message: string;
  /** Trace timestamp of the offending entry, when there is one. */
  timestamp?: number;
  /** Result-scope checks may pin the violation to one run. */
  runIndex?: number;
};

/** The traces one run-scope check sees. */
export type RunSubject = {
  run: Run;
  traces: TraceSet;
};

type AssertionBase = {
  name: string;
  flaky: boolean;
  /** Read the snapshots of this tag instead of the full-run traces. */
  tag?: string;
};

export type RunAssertion = AssertionBase & {
  scope: "run";
  check: (subject: RunSubject) => AssertionViolation | null;
};

export type ResultAssertion = AssertionBase & {
  scope: "result";
  check: (subjects: readonly RunSubject[]) => AssertionViolation | null;
};

export type AssertionData = RunAssertion | ResultAssertion;

export type AssertionFailure = {
  assertion: string;
  /** Null for a result-scope failure not pinned to a run. */
  runIndex: number | null;
  message: string;
};
