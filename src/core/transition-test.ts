import type { FrameStatsMonitor, StateSyncHelper, TraceMonitor } from "../monitor/monitor.js";
import type { AssertionData } from "../types/assertion.js";
import type { TraceSet } from "../types/trace.js";
import { silentReporter, type Reporter } from "../report/reporter.js";
import { AssertionFailureError, ConfigError, ExecutionError, toError } from "./errors.js";
import { pathComponentProblem } from "./names.js";
import { TransitionResult } from "./result.js";
import { nextTestState, type TestState } from "./test-state.js";
import { TransitionRunner } from "./transition-runner.js";

/** A phase step. Receives the test it runs in; may be async. */
export type Command<TDevice> = (test: TransitionTest<TDevice>) => unknown;

export type TransitionTestOptions<TDevice> = {
  /** Device handle passed through to the commands. Never inspected. */
  device: TDevice;
  outputDir: string;
  testName: string;
  repetitions: number;
  frameStatsMonitor?: FrameStatsMonitor | null;
  traceMonitors?: readonly TraceMonitor[];
  /** Before the first run. */
  testSetup?: readonly Command<TDevice>[];
  /** Before every run. */
  runSetup?: readonly Command<TDevice>[];
  /** After every run. */
  runTeardown?: readonly Command<TDevice>[];
  /** After the last run. */
  testTeardown?: readonly Command<TDevice>[];
  transitions?: readonly Command<TDevice>[];
  assertions?: readonly AssertionData[];
  runner?: TransitionRunner;
  stateSync?: StateSyncHelper | null;
  excludeJankyRuns?: boolean;
  reporter?: Reporter;
};

const frozen = <T>(items: readonly T[] | undefined): readonly T[] => Object.freeze([...(items ?? [])]);

/**
 * Runs a transition `repetitions` times, captures traces
 * and checks the assertions against them.
 *
 * Configuration is immutable. The only state is the result of the last
 * execution, replaced wholesale by `execute` and `cleanUp`. Drive one
 * instance from one caller at a time.
 */
export class TransitionTest<TDevice = unknown> {
  readonly device: TDevice;
  readonly outputDir: string;
  readonly testName: string;
  readonly repetitions: number;
  readonly frameStatsMonitor: FrameStatsMonitor | null;
  readonly traceMonitors: readonly TraceMonitor[];
  readonly testSetup: readonly Command<TDevice>[];
  readonly runSetup: readonly Command<TDevice>[];
  readonly runTeardown: readonly Command<TDevice>[];
  readonly testTeardown: readonly Command<TDevice>[];
  readonly transitions: readonly Command<TDevice>[];
  readonly assertions: readonly AssertionData[];
  readonly runner: TransitionRunner;
  readonly stateSync: StateSyncHelper | null;
  readonly excludeJankyRuns: boolean;
  readonly reporter: Reporter;

  private _result = new TransitionResult();
  private _state: TestState = "not_executed";

  constructor(opts: TransitionTestOptions<TDevice>) {
    if (!Number.isInteger(opts.repetitions) || opts.repetitions < 1) {
      throw new ConfigError(`repetitions must be an integer >= 1, got ${opts.repetitions}`);
    }
    const nameProblem = pathComponentProblem(opts.testName);
    if (nameProblem) {
      throw new ConfigError(`Invalid test name "${opts.testName}": ${nameProblem}`);
    }
    const monitors = frozen(opts.traceMonitors);
    const names = new Set<string>();
    const suffixes = new Set<string>();
    for (const monitor of monitors) {
      if (names.has(monitor.name)) throw new ConfigError(`Duplicate trace monitor: ${monitor.name}`);
      names.add(monitor.name);
      if (/[\\/]|\.\./.test(monitor.fileSuffix)) {
        throw new ConfigError(`Invalid file suffix "${monitor.fileSuffix}" of trace monitor ${monitor.name}`);
      }
      if (suffixes.has(monitor.fileSuffix)) {
        throw new ConfigError(`Duplicate file suffix "${monitor.fileSuffix}" of trace monitor ${monitor.name}`);
      }
      suffixes.add(monitor.fileSuffix);
    }

    this.device = opts.device;
    this.outputDir = opts.outputDir;
    this.testName = opts.testName;
    this.repetitions = opts.repetitions;
    this.frameStatsMonitor = opts.frameStatsMonitor ?? null;
    this.traceMonitors = monitors;
    this.testSetup = frozen(opts.testSetup);
    this.runSetup = frozen(opts.runSetup);
    this.runTeardown = frozen(opts.runTeardown);
    this.testTeardown = frozen(opts.testTeardown);
    this.transitions = frozen(opts.transitions);
    this.assertions = frozen(opts.assertions);
    this.runner = opts.runner ?? new TransitionRunner();
    this.stateSync = opts.stateSync ?? null;
    this.excludeJankyRuns = opts.excludeJankyRuns ?? false;
    this.reporter = opts.reporter ?? silentReporter;
  }

  get result(): TransitionResult {
    return this._result;
  }

  get state(): TestState {
    return this._state;
  }

  /**
   * Executes the test.
   *
   * @throws ExecutionError If the transition cannot be executed
   */
  async execute(): Promise<this> {
    this._state = nextTestState(this._state, "start");

    let result: TransitionResult;
    try {
      result = await this.runner.execute(this);
    } catch (e) {
      this._result = new TransitionResult([], toError(e));
      this._state = nextTestState(this._state, "failure");
      throw new ExecutionError(`Unable to execute transition: ${toError(e).message}`, e);
    }

    this._result = result;
    if (result.error) {
      this._state = nextTestState(this._state, "failure");
      throw new ExecutionError(`Unable to execute transition: ${result.error.message}`, result.error);
    }

    this._state = nextTestState(this._state, "success");
    return this;
  }

  /** Asserts that the transition of this test has been executed. */
  checkIsExecuted(): void {
    this._result.checkIsExecuted();
  }

  /**
   * Run the assertions on the traces, executing the transition first if it
   * has not run yet.
   *
   * @param onlyFlaky - Run only the flaky assertions
   * @throws AssertionFailureError If any assertion fails
   */
  async checkAssertions(onlyFlaky = false): Promise<void> {
    if (this._result.isEmpty()) {
      await this.execute();
    }
    const failures = this._result.checkAssertions(this.assertions, onlyFlaky);
    if (failures.length > 0) {
      throw new AssertionFailureError(failures);
    }
  }

  /**
   * Deletes the trace files of runs that passed and clears the cached result.
   * Returns the deleted paths.
   */
  cleanUp(): string[] {
    this.runner.cleanUp();
    const deleted = this._result.cleanUp();
    this._result = new TransitionResult();
    this._state = nextTestState(this._state, "reset");

    this.reporter.report({
      level: "info",
      code: "ARTIFACTS_CLEANED",
      message: `${this.testName}: deleted ${deleted.length} trace file(s)`,
      details: { deleted: deleted.length },
    });
    return deleted;
  }

  /**
   * Runs a set of commands and, at the end, creates a tag containing the
   * device state. The tag name is checked before any command runs.
   *
   * @throws InvalidTagError If `tag` cannot be part of a file name
   */
  async withTag(tag: string, commands: Command<TDevice>): Promise<TraceSet> {
    this.runner.validateTag(tag);
    await commands(this);
    return this.runner.createTag(this, tag);
  }

  createTag(tag: string): Promise<TraceSet> {
    return this.withTag(tag, () => undefined);
  }

  /** Block until the device is idle. No-op without a state-sync helper. */
  async waitForIdle(): Promise<void> {
    await this.stateSync?.waitForIdle();
  }

  /**
   * Same configuration with the assertions replaced by `newAssertion` (none
   * when absent) and, when `newName` is not empty, a new name.
   */
  copy(newAssertion?: AssertionData | null, newName = ""): TransitionTest<TDevice> {
    return new TransitionTest({
      ...this.toOptions(),
      testName: newName.length > 0 ? newName : this.testName,
      assertions: newAssertion ? [newAssertion] : [],
    });
  }

  toOptions(): TransitionTestOptions<TDevice> {
    return {
      device: this.device,
      outputDir: this.outputDir,
      testName: this.testName,
      repetitions: this.repetitions,
      frameStatsMonitor: this.frameStatsMonitor,
      traceMonitors: this.traceMonitors,
      testSetup: this.testSetup,
      runSetup: this.runSetup,
      runTeardown: this.runTeardown,
      testTeardown: this.testTeardown,
      transitions: this.transitions,
      assertions: this.assertions,
      runner: this.runner,
      stateSync: this.stateSync,
      excludeJankyRuns: this.excludeJankyRuns,
      reporter: this.reporter,
    };
  }

  toString(): string {
    return this.testName;
  }
}
