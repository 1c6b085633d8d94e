export { TransitionTest, type Command, type TransitionTestOptions } from "./core/transition-test.js";
export { TransitionTestBuilder, PhaseScope } from "./core/builder.js";
export { TransitionRunner, PHASES, type Phase } from "./core/transition-runner.js";
export { TransitionResult, type ResultOptions } from "./core/result.js";
export { TEST_STATES, nextTestState, type TestState, type TestEvent } from "./core/test-state.js";
export {
  HarnessError,
  ExecutionError,
  ExecutionStateError,
  AssertionFailureError,
  InvalidTagError,
  ConfigError,
  type HarnessErrorCode,
} from "./core/errors.js";
export { evaluate, evaluateAll, formatFailureMessage } from "./assertions/engine.js";
export { runAssertion, resultAssertion, type AssertionOptions } from "./assertions/define.js";
export { everyEntry, noEntry, lastEntry, sameAcrossRuns, traceOf, type StatePredicate } from "./assertions/trace-checks.js";
export type { TraceMonitor, FrameStatsMonitor, StateSyncHelper } from "./monitor/monitor.js";
export { StateDumpMonitor, type StateProvider } from "./monitor/state-dump.js";
export { createReporter, silentReporter, MemoryReporter, type Reporter, type ReportEvent } from "./report/reporter.js";
export { loadConfig, loadRawConfig } from "./config/loader.js";
export { validateConfig, parseConfig } from "./config/validator.js";
export type * from "./types/assertion.js";
export type * from "./types/trace.js";
export type * from "./types/manifest.js";
export type * from "./types/config.js";
