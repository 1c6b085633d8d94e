import type { TraceMonitor } from "../monitor/monitor.js";
import type { Run, TraceArtifact, TraceSet } from "../types/trace.js";
import type { Command, TransitionTest } from "./transition-test.js";
import { TraceArtifactWriter } from "../artifact-writer/writer.js";
import { ExecutionError, ExecutionStateError, InvalidTagError, toError } from "./errors.js";
import { pathComponentProblem } from "./names.js";
import { TransitionResult } from "./result.js";

/** Phases of one run, in execution order. */
export const PHASES = ["test setup", "run setup", "transition", "run teardown", "test teardown"] as const;

export type Phase = (typeof PHASES)[number];

type RunDraft = {
  index: number;
  traces: Map<string, TraceArtifact>;
  tags: Map<string, TraceSet>;
  jankyFrames: number | null;
};

type ActiveTransition = {
  owner: object;
  draft: RunDraft;
  writer: TraceArtifactWriter;
  monitors: readonly TraceMonitor[];
};

type RunOutcome = {
  /** Null when the run never started (test setup failed). */
  run: Run | null;
  failure: { phase: Phase; error: Error } | null;
};

/**
 * Executes the phases of a transition test and captures
 * traces around the transition window.
 *
 * Strictly sequential: each command is awaited before the next one starts.
 * The first failing phase aborts the run and every remaining repetition.
 */
export class TransitionRunner {
  private active: ActiveTransition | null = null;

  async execute<TDevice>(test: TransitionTest<TDevice>): Promise<TransitionResult> {
    const writer = new TraceArtifactWriter(test.outputDir, test.testName);
    writer.init();

    const runs: Run[] = [];
    let error: ExecutionError | null = null;

    for (let i = 0; i < test.repetitions; i++) {
      test.reporter.report({
        level: "info",
        code: "RUN_STARTED",
        message: `${test.testName}: run ${i + 1}/${test.repetitions} started`,
        details: { run: i },
      });

      const outcome = await this.executeRun(test, writer, i);
      if (outcome.run) runs.push(outcome.run);

      if (outcome.failure) {
        const { phase, error: cause } = outcome.failure;
        error = new ExecutionError(`Run ${i} of ${test.testName} failed during ${phase}: ${cause.message}`, cause);
        test.reporter.report({
          level: "error",
          code: "RUN_FAILED",
          message: error.message,
          details: { run: i, phase },
        });
        break;
      }

      const run = outcome.run;
      test.reporter.report({
        level: "info",
        code: "RUN_COMPLETED",
        message: `${test.testName}: run ${i + 1}/${test.repetitions} completed`,
        details: { run: i, traces: run ? run.traces.size : 0, janky_frames: run?.jankyFrames ?? null },
      });
    }

    writer.writeManifest({ repetitions: test.repetitions, runs, error });
    return new TransitionResult(runs, error, { excludeJankyRuns: test.excludeJankyRuns });
  }

  private async executeRun<TDevice>(
    test: TransitionTest<TDevice>,
    writer: TraceArtifactWriter,
    index: number,
  ): Promise<RunOutcome> {
    const isFirst = index === 0;
    const isLast = index === test.repetitions - 1;

    if (isFirst) {
      try {
        await runCommands(test, test.testSetup);
      } catch (e) {
        return { run: null, failure: { phase: "test setup", error: toError(e) } };
      }
    }

    const draft: RunDraft = { index, traces: new Map(), tags: new Map(), jankyFrames: null };
    let phase: Phase = "run setup";

    try {
      await runCommands(test, test.runSetup);
      phase = "transition";
      await this.captureTransition(test, writer, draft);
      phase = "run teardown";
      await runCommands(test, test.runTeardown);
      if (isLast) {
        phase = "test teardown";
        await runCommands(test, test.testTeardown);
      }
    } catch (e) {
      const error = toError(e);
      return { run: freezeRun(draft, error), failure: { phase, error } };
    }

    return { run: freezeRun(draft, null), failure: null };
  }

  /**
   * Start the monitors, run the transition commands, stop the monitors.
   * Every monitor that started is stopped and flushed, whatever failed.
   */
  private async captureTransition<TDevice>(
    test: TransitionTest<TDevice>,
    writer: TraceArtifactWriter,
    draft: RunDraft,
  ): Promise<void> {
    const started: TraceMonitor[] = [];
    let frameStatsStarted = false;
    let failure: Error | null = null;

    try {
      for (const monitor of test.traceMonitors) {
        await monitor.start();
        started.push(monitor);
      }
      if (test.frameStatsMonitor) {
        await test.frameStatsMonitor.start();
        frameStatsStarted = true;
      }

      this.active = { owner: test, draft, writer, monitors: started };
      await runCommands(test, test.transitions);
    } catch (e) {
      failure = toError(e);
    }

    this.active = null;

    for (const monitor of started) {
      try {
        const trace = await monitor.stop();
        draft.traces.set(
          monitor.name,
          writer.writeTrace({ run: draft.index, tag: null, monitor: monitor.name, fileSuffix: monitor.fileSuffix, trace }),
        );
      } catch (e) {
        failure ??= new Error(`Unable to stop monitor ${monitor.name}: ${toError(e).message}`, { cause: e });
      }
    }

    if (frameStatsStarted && test.frameStatsMonitor) {
      try {
        const janky = await test.frameStatsMonitor.stop();
        if (!Number.isInteger(janky) || janky < 0) {
          throw new Error(`invalid janky frame count ${janky}`);
        }
        draft.jankyFrames = janky;
      } catch (e) {
        failure ??= new Error(`Unable to stop frame stats monitor: ${toError(e).message}`, { cause: e });
      }
    }

    if (failure) throw failure;
  }

  /** Reject a tag that cannot be part of an artifact file name. */
  validateTag(tag: string): void {
    const problem = pathComponentProblem(tag);
    if (problem) throw new InvalidTagError(tag, problem);
  }

  /**
   * Ask every running monitor for a snapshot named `tag` without stopping
   * the capture. Only valid while `test`'s transition commands run.
   */
  async createTag<TDevice>(test: TransitionTest<TDevice>, tag: string): Promise<TraceSet> {
    this.validateTag(tag);

    const active = this.active;
    if (!active || active.owner !== test) {
      throw new ExecutionStateError(
        "TAG_OUTSIDE_TRANSITION",
        `Tag "${tag}" can only be created while the transition of ${test.testName} is running`,
      );
    }

    const { draft, writer } = active;
    if (draft.tags.has(tag)) {
      throw new InvalidTagError(tag, `already used in run ${draft.index}`);
    }

    const snapshots = new Map<string, TraceArtifact>();
    for (const monitor of active.monitors) {
      const trace = await monitor.snapshot(tag);
      snapshots.set(
        monitor.name,
        writer.writeTrace({ run: draft.index, tag, monitor: monitor.name, fileSuffix: monitor.fileSuffix, trace }),
      );
    }
    draft.tags.set(tag, snapshots);

    test.reporter.report({
      level: "info",
      code: "TAG_CREATED",
      message: `${test.testName}: tag ${tag} created in run ${draft.index}`,
      details: { run: draft.index, tag },
    });
    return snapshots;
  }

  /** Drop transition state left behind by an aborted execution. */
  cleanUp(): void {
    this.active = null;
  }
}

async function runCommands<TDevice>(
  test: TransitionTest<TDevice>,
  commands: readonly Command<TDevice>[],
): Promise<void> {
  for (const command of commands) {
    await command(test);
  }
}

function freezeRun(draft: RunDraft, error: Error | null): Run {
  return Object.freeze({
    index: draft.index,
    traces: draft.traces,
    tags: draft.tags,
    jankyFrames: draft.jankyFrames,
    error,
  });
}
