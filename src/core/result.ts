import fs from "node:fs";
import type { AssertionData, AssertionFailure } from "../types/assertion.js";
import type { Run } from "../types/trace.js";
import { evaluateAll, formatFailureMessage } from "../assertions/engine.js";
import { ExecutionStateError } from "./errors.js";

export type ResultOptions = {
  /** Leave runs with janky frames out of assertion evaluation. */
  excludeJankyRuns?: boolean;
};

/**
 * Every run of one execution plus the global error.
 *
 * Runs are frozen. The only state that changes after construction is the
 * record of which runs failed the most recent `checkAssertions` call, which
 * `cleanUp` consults.
 */
export class TransitionResult {
  readonly runs: readonly Run[];
  readonly error: Error | null;
  private readonly excludeJankyRuns: boolean;
  private failedRuns = new Set<number>();

  constructor(runs: readonly Run[] = [], error: Error | null = null, opts: ResultOptions = {}) {
    this.runs = Object.freeze([...runs]);
    this.error = error;
    this.excludeJankyRuns = opts.excludeJankyRuns ?? false;
  }

  /** Nothing executed yet. */
  isEmpty(): boolean {
    return this.runs.length === 0 && this.error === null;
  }

  isExecuted(): boolean {
    return this.runs.length > 0 && this.error === null;
  }

  checkIsExecuted(): void {
    if (!this.isExecuted()) {
      const reason = this.error ? `execution failed: ${this.error.message}` : "no run recorded";
      throw new ExecutionStateError("NOT_EXECUTED", `Transition was not executed (${reason})`);
    }
  }

  /** Runs the assertions are evaluated against. */
  evaluatedRuns(): Run[] {
    return this.runs.filter((run) => !this.isExcluded(run));
  }

  private isExcluded(run: Run): boolean {
    return this.excludeJankyRuns && (run.jankyFrames ?? 0) > 0;
  }

  /**
   * Evaluate the assertions (only the flaky ones when `onlyFlaky`) against
   * every evaluated run. All assertions are evaluated; nothing short-circuits.
   * Every selected assertion fails when all runs were excluded as janky.
   */
  checkAssertions(assertions: readonly AssertionData[], onlyFlaky = false): AssertionFailure[] {
    this.checkIsExecuted();

    const selected = onlyFlaky ? assertions.filter((a) => a.flaky) : assertions;
    const runs = this.evaluatedRuns();
    if (runs.length === 0) {
      this.failedRuns = new Set();
      const violation = { message: `all ${this.runs.length} run(s) were excluded as janky` };
      return selected.map((a) => ({
        assertion: a.name,
        runIndex: null,
        message: formatFailureMessage(a.name, null, violation),
      }));
    }
    const failures = evaluateAll(selected, runs);

    const failed = new Set<number>();
    for (const f of failures) {
      if (f.runIndex !== null) {
        failed.add(f.runIndex);
      } else {
        for (const run of runs) failed.add(run.index);
      }
    }
    this.failedRuns = failed;

    return failures;
  }

  /** Indexes of the runs that failed the most recent evaluation. */
  getFailedRuns(): number[] {
    return [...this.failedRuns].sort((a, b) => a - b);
  }

  /**
   * Delete the trace files of every run that passed the most recent
   * evaluation and finished without error. Runs excluded as janky keep
   * theirs. Returns the deleted paths.
   */
  cleanUp(): string[] {
    const deleted: string[] = [];
    for (const run of this.runs) {
      if (run.error !== null || this.failedRuns.has(run.index) || this.isExcluded(run)) continue;

      const artifacts = [...run.traces.values()];
      for (const tagged of run.tags.values()) artifacts.push(...tagged.values());

      for (const artifact of artifacts) {
        if (!fs.existsSync(artifact.path)) continue;
        fs.rmSync(artifact.path, { force: true });
        deleted.push(artifact.path);
      }
    }
    return deleted;
  }
}
