import type { ResultAssertion, RunAssertion } from "../types/assertion.js";

export type AssertionOptions = {
  flaky?: boolean;
  tag?: string;
};

/** An assertion evaluated once per run. */
export function runAssertion(name: string, check: RunAssertion["check"], opts: AssertionOptions = {}): RunAssertion {
  return withTag({ name, scope: "run", flaky: opts.flaky ?? false, check }, opts.tag);
}

/** An assertion evaluated once over all runs, e.g. to compare repetitions. */
export function resultAssertion(
  name: string,
  check: ResultAssertion["check"],
  opts: AssertionOptions = {},
): ResultAssertion {
  return withTag({ name, scope: "result", flaky: opts.flaky ?? false, check }, opts.tag);
}

function withTag<T extends RunAssertion | ResultAssertion>(assertion: T, tag: string | undefined): Readonly<T> {
  return Object.freeze(tag === undefined ? assertion : { ...assertion, tag });
}
