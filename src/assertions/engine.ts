import type {
  AssertionData,
  AssertionFailure,
  AssertionViolation,
  RunSubject,
} from "../types/assertion.js";
import type { Run } from "../types/trace.js";
import { toError } from "../core/errors.js";

/** `<name> (run <i>): <message> at <timestamp>ms` */
export function formatFailureMessage(name: string, runIndex: number | null, violation: AssertionViolation): string {
  const where = runIndex === null ? "" : ` (run ${runIndex})`;
  const when = violation.timestamp === undefined ? "" : ` at ${violation.timestamp}ms`;
  return `${name}${where}: ${violation.message}${when}`;
}

function failure(name: string, runIndex: number | null, violation: AssertionViolation): AssertionFailure {
  return { assertion: name, runIndex, message: formatFailureMessage(name, runIndex, violation) };
}

/** A predicate that throws is reported the same way as one that rejects. */
function invoke<T>(check: (input: T) => AssertionViolation | null, input: T): AssertionViolation | null {
  try {
    return check(input);
  } catch (e) {
    return { message: toError(e).message };
  }
}

/** Pick the trace set the assertion reads from each run. */
export function subjectsFor(assertion: AssertionData, runs: readonly Run[]): RunSubject[] {
  const tag = assertion.tag;
  if (tag === undefined) {
    return runs.map((run) => ({ run, traces: run.traces }));
  }

  const subjects: RunSubject[] = [];
  for (const run of runs) {
    const traces = run.tags.get(tag);
    if (traces) subjects.push({ run, traces });
  }
  return subjects;
}

/**
 * Evaluate one assertion against the recorded runs. Returns every failure;
 * an empty list means the assertion passed.
 */
export function evaluate(assertion: AssertionData, runs: readonly Run[]): AssertionFailure[] {
  const subjects = subjectsFor(assertion, runs);

  if (assertion.tag !== undefined && subjects.length === 0) {
    return [failure(assertion.name, null, { message: `Tag "${assertion.tag}" was not recorded in any run` })];
  }

  if (assertion.scope === "result") {
    const violation = invoke(assertion.check, subjects);
    return violation ? [failure(assertion.name, violation.runIndex ?? null, violation)] : [];
  }

  const failures: AssertionFailure[] = [];
  for (const subject of subjects) {
    const violation = invoke(assertion.check, subject);
    if (violation) failures.push(failure(assertion.name, subject.run.index, violation));
  }
  return failures;
}

/** Evaluate every assertion; never stops at the first failing one. */
export function evaluateAll(assertions: readonly AssertionData[], runs: readonly Run[]): AssertionFailure[] {
  const failures: AssertionFailure[] = [];
  for (const assertion of assertions) {
    failures.push(...evaluate(assertion, runs));
  }
  return failures;
}
