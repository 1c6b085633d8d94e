import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { TransitionTest, type TransitionTestOptions } from "../src/core/transition-test.js";
import {
  AssertionFailureError,
  ConfigError,
  ExecutionError,
  ExecutionStateError,
  InvalidTagError,
} from "../src/core/errors.js";
import { resultAssertion, runAssertion } from "../src/assertions/define.js";
import { MemoryReporter } from "../src/report/reporter.js";
import { createDevice, FakeMonitor, makeTmpDir, step, type Device } from "./fakes.js";

const alwaysFails = runAssertion("always-fails", () => ({ message: "nope" }));
const alwaysPasses = runAssertion("always-passes", () => null);

describe("TransitionTest", () => {
  let tmpDir: string;
  let device: Device;

  beforeEach(() => {
    tmpDir = makeTmpDir("flicker-test-");
    device = createDevice();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeTest(overrides: Partial<TransitionTestOptions<Device>> = {}): TransitionTest<Device> {
    return new TransitionTest<Device>({
      device,
      outputDir: tmpDir,
      testName: "test",
      repetitions: 3,
      traceMonitors: [new FakeMonitor("wm", device)],
      transitions: [step("transition")],
      ...overrides,
    });
  }

  async function failureOf(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (e) {
      return e;
    }
    throw new Error("expected a rejection");
  }

  describe("execute", () => {
    it("stores the result and moves to executed_ok", async () => {
      const test = makeTest();
      expect(test.state).toBe("not_executed");

      await test.execute();

      expect(test.state).toBe("executed_ok");
      expect(test.result.runs).toHaveLength(3);
      expect(() => test.checkIsExecuted()).not.toThrow();
    });

    it("fails fatally when the transition cannot run", async () => {
      const test = makeTest({
        transitions: [
          () => {
            throw new Error("boom");
          },
        ],
      });

      const error = await failureOf(test.execute());

      expect(error).toBeInstanceOf(ExecutionError);
      expect(error).toHaveProperty("message", "Unable to execute transition: Run 0 of test failed during transition: boom");
      expect(test.state).toBe("executed_with_error");
      expect(() => test.checkIsExecuted()).toThrow(ExecutionStateError);
    });

    it("refuses to start from inside its own transition", async () => {
      const test = makeTest({ repetitions: 1, transitions: [(t) => t.execute()] });

      const error = await failureOf(test.execute());

      expect(error).toBeInstanceOf(ExecutionError);
      expect(error).toHaveProperty(
        "message",
        "Unable to execute transition: Run 0 of test failed during transition: Transition is already executing",
      );
    });

    it("replaces the previous result on re-execution", async () => {
      const test = makeTest({ repetitions: 1 });
      await test.execute();
      const first = test.result;

      await test.execute();

      expect(test.result).not.toBe(first);
      expect(test.result.runs).toHaveLength(1);
    });
  });

  describe("checkIsExecuted", () => {
    it("fails before execution", () => {
      expect(() => makeTest().checkIsExecuted()).toThrow("Transition was not executed (no run recorded)");
    });
  });

  describe("checkAssertions", () => {
    it("executes lazily when nothing ran yet", async () => {
      const test = makeTest({ assertions: [alwaysPasses] });

      await test.checkAssertions();

      expect(test.state).toBe("executed_ok");
      expect(device.log.filter((l) => l === "transition")).toHaveLength(3);
    });

    it("does not re-execute once executed", async () => {
      const test = makeTest({ assertions: [alwaysPasses] });
      await test.execute();

      await test.checkAssertions();

      expect(device.log.filter((l) => l === "transition")).toHaveLength(3);
    });

    it("reports one line per failing run for a run-scope assertion", async () => {
      const test = makeTest({ assertions: [alwaysFails] });

      const error = await failureOf(test.checkAssertions());

      expect(error).toBeInstanceOf(AssertionFailureError);
      expect(error).toHaveProperty(
        "message",
        ["always-fails (run 0): nope", "always-fails (run 1): nope", "always-fails (run 2): nope"].join("\n"),
      );
    });

    it("reports one line for a result-scope assertion", async () => {
      const test = makeTest({ assertions: [resultAssertion("always-fails", () => ({ message: "nope" }))] });

      const error = await failureOf(test.checkAssertions());

      expect(error).toHaveProperty("message", "always-fails: nope");
    });

    it("evaluates every assertion, not just the first failing one", async () => {
      const other = runAssertion("other", (s) => (s.run.index === 2 ? { message: "late" } : null));
      const test = makeTest({ assertions: [alwaysFails, alwaysPasses, other] });

      const error = await failureOf(test.checkAssertions());

      expect(error).toBeInstanceOf(AssertionFailureError);
      if (error instanceof AssertionFailureError) {
        expect(error.failures.map((f) => `${f.assertion}:${f.runIndex}`)).toEqual([
          "always-fails:0",
          "always-fails:1",
          "always-fails:2",
          "other:2",
        ]);
      }
    });

    it("gives the same failures when called twice", async () => {
      const test = makeTest({ assertions: [alwaysFails] });

      const first = await failureOf(test.checkAssertions());
      const second = await failureOf(test.checkAssertions());

      expect(second).toHaveProperty("message", first instanceof Error ? first.message : "");
      expect(device.log.filter((l) => l === "transition")).toHaveLength(3);
    });

    it("skips non-flaky assertions when only flaky ones are requested", async () => {
      const test = makeTest({ assertions: [alwaysFails] });
      await expect(test.checkAssertions(true)).resolves.toBeUndefined();
    });

    it("runs flaky assertions when only flaky ones are requested", async () => {
      const flaky = runAssertion("flaky-one", () => ({ message: "sometimes" }), { flaky: true });
      const test = makeTest({ repetitions: 1, assertions: [alwaysFails, flaky] });

      const error = await failureOf(test.checkAssertions(true));

      expect(error).toHaveProperty("message", "flaky-one (run 0): sometimes");
    });

    it("surfaces an execution failure instead of evaluating", async () => {
      const test = makeTest({
        assertions: [alwaysPasses],
        transitions: [
          () => {
            throw new Error("boom");
          },
        ],
      });
      await expect(test.execute()).rejects.toBeInstanceOf(ExecutionError);

      const error = await failureOf(test.checkAssertions());

      expect(error).toBeInstanceOf(ExecutionStateError);
      expect(error).toHaveProperty("code", "NOT_EXECUTED");
    });
  });

  describe("cleanUp", () => {
    it("keeps the traces of failing runs and deletes the rest", async () => {
      const secondRunFails = runAssertion("second", (s) => (s.run.index === 1 ? { message: "bad" } : null));
      const test = makeTest({ repetitions: 2, assertions: [secondRunFails] });
      await expect(test.checkAssertions()).rejects.toBeInstanceOf(AssertionFailureError);

      const deleted = test.cleanUp();

      expect(deleted).toEqual([path.join(tmpDir, "test_0_wm.json")]);
      expect(fs.existsSync(path.join(tmpDir, "test_1_wm.json"))).toBe(true);
      expect(fs.existsSync(path.join(tmpDir, "test_manifest.json"))).toBe(true);
    });

    it("resets to an empty result", async () => {
      const reporter = new MemoryReporter();
      const test = makeTest({ reporter });
      await test.execute();

      test.cleanUp();

      expect(test.state).toBe("not_executed");
      expect(test.result.isEmpty()).toBe(true);
      expect(reporter.codes().at(-1)).toBe("ARTIFACTS_CLEANED");
    });

    it("deletes every trace when no assertion was checked", async () => {
      const test = makeTest({ repetitions: 2 });
      await test.execute();

      expect(test.cleanUp()).toHaveLength(2);
      expect(fs.readdirSync(tmpDir)).toEqual(["test_manifest.json"]);
    });

    it("executes again after a clean up", async () => {
      const test = makeTest({ repetitions: 1, assertions: [alwaysPasses] });
      await test.checkAssertions();
      test.cleanUp();

      await test.checkAssertions();

      expect(device.log.filter((l) => l === "transition")).toHaveLength(2);
    });
  });

  describe("tags", () => {
    it("rejects an invalid tag before running the commands", async () => {
      const test = makeTest();
      await expect(test.withTag("a/b", step("never"))).rejects.toBeInstanceOf(InvalidTagError);
      expect(device.log).toEqual([]);
    });

    it("refuses createTag outside a transition", async () => {
      const error = await failureOf(makeTest().createTag("mid"));
      expect(error).toHaveProperty("code", "TAG_OUTSIDE_TRANSITION");
    });

    it("feeds tagged snapshots to tag assertions", async () => {
      const onMid = runAssertion("mid-is-app", () => ({ message: "checked" }), { tag: "mid" });
      const test = makeTest({ repetitions: 1, assertions: [onMid], transitions: [(t) => t.createTag("mid")] });

      const error = await failureOf(test.checkAssertions());

      expect(error).toHaveProperty("message", "mid-is-app (run 0): checked");
    });
  });

  describe("copy", () => {
    it("replaces the assertions and the name", () => {
      const test = makeTest({ assertions: [alwaysPasses, alwaysFails] });

      const copy = test.copy(alwaysFails, "name2");

      expect(copy.testName).toBe("name2");
      expect(copy.assertions).toEqual([alwaysFails]);
      expect(copy.repetitions).toBe(3);
      expect(copy.traceMonitors).toEqual(test.traceMonitors);
      expect(copy.transitions).toEqual(test.transitions);
      expect(copy.runner).toBe(test.runner);
      expect(test.assertions).toEqual([alwaysPasses, alwaysFails]);
    });

    it("keeps the name when the new one is empty and drops assertions when none is given", () => {
      const copy = makeTest({ assertions: [alwaysFails] }).copy();
      expect(copy.testName).toBe("test");
      expect(copy.assertions).toEqual([]);
    });

    it("does not share the assertion list", () => {
      const test = makeTest({ assertions: [alwaysPasses] });
      const copy = test.copy(alwaysFails);

      expect(copy.assertions).not.toBe(test.assertions);
      expect(Object.isFrozen(copy.assertions)).toBe(true);
      expect(Object.isFrozen(test.assertions)).toBe(true);
    });

    it("starts from an empty result", async () => {
      const test = makeTest({ repetitions: 1 });
      await test.execute();

      const copy = test.copy(null, "fresh");

      expect(copy.state).toBe("not_executed");
      expect(copy.result.isEmpty()).toBe(true);
    });
  });

  describe("configuration", () => {
    it("rejects fewer than one repetition", () => {
      expect(() => makeTest({ repetitions: 0 })).toThrow(ConfigError);
      expect(() => makeTest({ repetitions: 1.5 })).toThrow("repetitions must be an integer >= 1, got 1.5");
    });

    it("rejects a test name that cannot be part of a file name", () => {
      expect(() => makeTest({ testName: "open app" })).toThrow(ConfigError);
    });

    it("rejects two monitors with the same name", () => {
      const monitors = [new FakeMonitor("wm", device), new FakeMonitor("wm", device)];
      expect(() => makeTest({ traceMonitors: monitors })).toThrow("Duplicate trace monitor: wm");
    });

    it("rejects two monitors writing to the same file", () => {
      const monitors = [
        new FakeMonitor("a", device, { fileSuffix: ".json" }),
        new FakeMonitor("b", device, { fileSuffix: ".json" }),
      ];
      expect(() => makeTest({ traceMonitors: monitors })).toThrow('Duplicate file suffix ".json" of trace monitor b');
    });

    it("rejects a file suffix that leaves the output directory", () => {
      for (const fileSuffix of ["/wm.json", "_..json", "\\wm.json"]) {
        const monitors = [new FakeMonitor("wm", device, { fileSuffix })];
        expect(() => makeTest({ traceMonitors: monitors })).toThrow(ConfigError);
      }
      const escaping = [new FakeMonitor("wm", device, { fileSuffix: "/../../wm.json" })];
      expect(() => makeTest({ traceMonitors: escaping })).toThrow('Invalid file suffix "/../../wm.json" of trace monitor wm');
    });

    it("does not alias the caller's command arrays", () => {
      const transitions = [step("transition")];
      const test = makeTest({ transitions });
      transitions.push(step("late"));
      expect(test.transitions).toHaveLength(1);
    });

    it("prints as its name", () => {
      expect(String(makeTest({ testName: "open_app" }))).toBe("open_app");
    });
  });
});
