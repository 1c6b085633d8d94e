import { ExecutionStateError } from "./errors.js";

/** Lifecycle of one transition test. */
export const TEST_STATES = ["not_executed", "executing", "executed_ok", "executed_with_error"] as const;

export type TestState = (typeof TEST_STATES)[number];

/** Events that drive state transitions. */
export type TestEvent = "start" | "success" | "failure" | "reset";

/**
 * Pure function: given current state + event, return next state.
 * Re-executing is allowed from any settled state; nesting an execution
 * inside a running one is not.
 */
export function nextTestState(current: TestState, event: TestEvent): TestState {
  switch (event) {
    case "start":
      if (current === "executing") {
        throw new ExecutionStateError("ALREADY_EXECUTING", "Transition is already executing");
      }
      return "executing";
    case "success":
      return current === "executing" ? "executed_ok" : current;
    case "failure":
      return current === "executing" ? "executed_with_error" : current;
    case "reset":
      return "not_executed";
  }
}

