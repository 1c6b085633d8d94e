import path from "node:path";
import { pathToFileURL } from "node:url";
import type { HarnessConfig } from "../types/config.js";
import type { Reporter } from "../report/reporter.js";
import { TransitionTest } from "../core/transition-test.js";
import { AssertionFailureError, ExecutionError, ExecutionStateError, toError } from "../core/errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ScenarioFactory = (config: HarnessConfig) => TransitionTest | Promise<TransitionTest>;

export type RunResult =
  | { ok: true; testName: string; runs: number; deleted: string[] }
  | { ok: false; exitCode: ExitCode; error: { code: string; message: string } };

/**
 * Resolve the default export of a scenario module: a transition test, or a
 * function of the config returning one.
 */
export async function resolveScenario(mod: unknown, config: HarnessConfig): Promise<TransitionTest> {
  if (typeof mod !== "object" || mod === null || !("default" in mod)) {
    throw new Error("Scenario module has no default export");
  }

  const exported: unknown = mod.default;
  const produced: unknown = typeof exported === "function" ? await exported(config) : exported;
  if (!(produced instanceof TransitionTest)) {
    throw new Error("Scenario default export must be a TransitionTest or a function returning one");
  }
  return produced;
}

export async function loadScenario(modulePath: string, config: HarnessConfig): Promise<TransitionTest> {
  const url = pathToFileURL(path.resolve(modulePath)).href;
  const mod: unknown = await import(url);
  return resolveScenario(mod, config);
}

/**
 * Execute a transition test, check its assertions and clean up the traces
 * of passing runs (unless `keep`).
 */
export async function runTest<TDevice>(
  test: TransitionTest<TDevice>,
  opts: { onlyFlaky?: boolean; keep?: boolean; reporter: Reporter },
): Promise<RunResult> {
  const { reporter } = opts;

  try {
    await test.execute();
  } catch (e) {
    const message = toError(e).message;
    reporter.report({ level: "error", code: "EXECUTION_FAILED", message });
    return { ok: false, exitCode: EXIT.EXECUTION_FAILED, error: { code: "EXECUTION_FAILED", message } };
  }

  const runs = test.result.runs.length;
  let failure: RunResult | null = null;

  try {
    await test.checkAssertions(opts.onlyFlaky ?? false);
  } catch (e) {
    if (e instanceof AssertionFailureError) {
      for (const f of e.failures) {
        reporter.report({
          level: "error",
          code: "ASSERTION_FAILED",
          message: f.message,
          details: { assertion: f.assertion, run: f.runIndex },
        });
      }
      failure = { ok: false, exitCode: EXIT.ASSERTION_FAILED, error: { code: e.code, message: e.message } };
    } else if (e instanceof ExecutionError || e instanceof ExecutionStateError) {
      reporter.report({ level: "error", code: e.code, message: e.message });
      return { ok: false, exitCode: EXIT.EXECUTION_FAILED, error: { code: e.code, message: e.message } };
    } else {
      throw e;
    }
  }

  const deleted = opts.keep ? [] : test.cleanUp();
  if (failure) return failure;

  reporter.report({
    level: "info",
    code: "OK",
    message: `${test.testName}: ${runs} run(s) passed`,
    details: { runs, deleted: deleted.length },
  });
  return { ok: true, testName: test.testName, runs, deleted };
}

/** Load a scenario module and run it. */
export async function run(opts: {
  modulePath: string;
  config: HarnessConfig;
  onlyFlaky?: boolean;
  keep?: boolean;
  reporter: Reporter;
}): Promise<RunResult> {
  let test: TransitionTest;
  try {
    test = await loadScenario(opts.modulePath, opts.config);
  } catch (e) {
    const message = `Failed to load scenario ${opts.modulePath}: ${toError(e).message}`;
    opts.reporter.report({ level: "error", code: "SCENARIO_LOAD_FAILED", message });
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: { code: "SCENARIO_LOAD_FAILED", message } };
  }

  return runTest(test, {
    onlyFlaky: opts.onlyFlaky,
    keep: opts.keep ?? opts.config.keep_artifacts ?? false,
    reporter: opts.reporter,
  });
}
