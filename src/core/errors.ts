import type { AssertionFailure } from "../types/assertion.js";

export type HarnessErrorCode =
  | "EXECUTION_FAILED"
  | "NOT_EXECUTED"
  | "TAG_OUTSIDE_TRANSITION"
  | "ALREADY_EXECUTING"
  | "ASSERTION_FAILED"
  | "INVALID_TAG"
  | "CONFIG_INVALID";

/** Base class for every failure the harness raises on purpose. */
export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(code: HarnessErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A phase command or monitor could not be driven. Fatal, never retried. */
export class ExecutionError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super("EXECUTION_FAILED", message, { cause });
  }
}

/** An operation was called in the wrong lifecycle state. */
export class ExecutionStateError extends HarnessError {
  constructor(code: "NOT_EXECUTED" | "TAG_OUTSIDE_TRANSITION" | "ALREADY_EXECUTING", message: string) {
    super(code, message);
  }
}

/** Captured data violates one or more assertions. */
export class AssertionFailureError extends HarnessError {
  readonly failures: readonly AssertionFailure[];

  constructor(failures: readonly AssertionFailure[]) {
    super("ASSERTION_FAILED", failures.map((f) => f.message).join("\n"));
    this.failures = failures;
  }
}

export class InvalidTagError extends HarnessError {
  constructor(tag: string, reason: string) {
    super("INVALID_TAG", `Invalid tag "${tag}": ${reason}`);
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Normalize anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
