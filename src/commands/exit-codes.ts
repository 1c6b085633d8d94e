/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  ASSERTION_FAILED: 1,
  EXECUTION_FAILED: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
