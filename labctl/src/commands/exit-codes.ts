/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  NO_RUNS: 2,
  AMBIGUOUS: 3,
  SERVICE_ERROR: 4,
  INVALID_ARGS: 5,
  CONFLICT: 6,
  REGRESSION: 7,
  BATCH_NOT_READY: 8,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
