import type { FrameStatsMonitor, StateSyncHelper, TraceMonitor } from "../monitor/monitor.js";
import type { AssertionData } from "../types/assertion.js";
import type { HarnessConfig } from "../types/config.js";
import { createReporter, silentReporter, type Reporter } from "../report/reporter.js";
import { TransitionTest, type Command } from "./transition-test.js";
import type { TransitionRunner } from "./transition-runner.js";

export const DEFAULT_TEST_NAME = "test";
export const DEFAULT_OUTPUT_DIR = "flicker-results";

/**
 * Registration surface of one phase (setup or teardown). Only exposes the
 * two groupings a phase has, so commands cannot land in another phase.
 */
export class PhaseScope<TDevice> {
  constructor(
    private readonly once: Command<TDevice>[],
    private readonly perRun: Command<TDevice>[],
  ) {}

  /** Runs once for the whole test. */
  test(...commands: Command<TDevice>[]): this {
    this.once.push(...commands);
    return this;
  }

  /** Runs around every repetition. */
  eachRun(...commands: Command<TDevice>[]): this {
    this.perRun.push(...commands);
    return this;
  }
}

/**
 * Builds a {@link TransitionTest}.
 *
 * @example
 * const test = new TransitionTestBuilder(device)
 *   .withTestName("open_app")
 *   .repeat(3)
 *   .withTraceMonitor(windowMonitor)
 *   .setup((s) => s.test((t) => t.device.unlock()).eachRun((t) => t.device.goHome()))
 *   .transitions((t) => t.device.launch("app"))
 *   .teardown((s) => s.eachRun((t) => t.device.pressBack()))
 *   .assertion(appBecomesVisible)
 *   .build();
 */
export class TransitionTestBuilder<TDevice> {
  private testName = DEFAULT_TEST_NAME;
  private outputDir = DEFAULT_OUTPUT_DIR;
  private repetitions = 1;
  private frameStats: FrameStatsMonitor | null = null;
  private monitors: TraceMonitor[] = [];
  private testSetup: Command<TDevice>[] = [];
  private runSetup: Command<TDevice>[] = [];
  private runTeardown: Command<TDevice>[] = [];
  private testTeardown: Command<TDevice>[] = [];
  private transitionCommands: Command<TDevice>[] = [];
  private assertions: AssertionData[] = [];
  private runner: TransitionRunner | undefined;
  private stateSync: StateSyncHelper | null = null;
  private skipJanky = false;
  private reporter: Reporter = silentReporter;

  constructor(private readonly device: TDevice) {}

  /** Start from the defaults of a loaded config. */
  static fromConfig<TDevice>(device: TDevice, config: HarnessConfig): TransitionTestBuilder<TDevice> {
    const builder = new TransitionTestBuilder(device)
      .withOutputDir(config.output_dir)
      .repeat(config.repetitions)
      .excludeJankyRuns(config.exclude_janky_runs ?? false);
    if (config.report_format) builder.withReporter(createReporter(config.report_format));
    return builder;
  }

  withTestName(name: string): this {
    this.testName = name;
    return this;
  }

  withOutputDir(dir: string): this {
    this.outputDir = dir;
    return this;
  }

  /** Number of times the transition runs. Checked on `build`. */
  repeat(times: number): this {
    this.repetitions = times;
    return this;
  }

  withTraceMonitor(...monitors: TraceMonitor[]): this {
    this.monitors.push(...monitors);
    return this;
  }

  withFrameStats(monitor: FrameStatsMonitor): this {
    this.frameStats = monitor;
    return this;
  }

  /** Leave runs with janky frames out of assertion evaluation. */
  excludeJankyRuns(enabled = true): this {
    this.skipJanky = enabled;
    return this;
  }

  withStateSync(helper: StateSyncHelper): this {
    this.stateSync = helper;
    return this;
  }

  withReporter(reporter: Reporter): this {
    this.reporter = reporter;
    return this;
  }

  withRunner(runner: TransitionRunner): this {
    this.runner = runner;
    return this;
  }

  setup(register: (scope: PhaseScope<TDevice>) => void): this {
    register(new PhaseScope(this.testSetup, this.runSetup));
    return this;
  }

  teardown(register: (scope: PhaseScope<TDevice>) => void): this {
    register(new PhaseScope(this.testTeardown, this.runTeardown));
    return this;
  }

  transitions(...commands: Command<TDevice>[]): this {
    this.transitionCommands.push(...commands);
    return this;
  }

  assertion(...assertions: AssertionData[]): this {
    this.assertions.push(...assertions);
    return this;
  }

  /** @throws ConfigError If the repetitions, test name or monitors are invalid */
  build(): TransitionTest<TDevice> {
    return new TransitionTest({
      device: this.device,
      outputDir: this.outputDir,
      testName: this.testName,
      repetitions: this.repetitions,
      frameStatsMonitor: this.frameStats,
      traceMonitors: this.monitors,
      testSetup: this.testSetup,
      runSetup: this.runSetup,
      runTeardown: this.runTeardown,
      testTeardown: this.testTeardown,
      transitions: this.transitionCommands,
      assertions: this.assertions,
      runner: this.runner,
      stateSync: this.stateSync,
      excludeJankyRuns: this.skipJanky,
      reporter: this.reporter,
    });
  }
}
