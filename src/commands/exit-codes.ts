/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PIPELINE_FAILED: 1,
  INVALID_INPUT: 2,
  HEALTH_TIMEOUT: 3,
  TRANSFER_FAILED: 4,
  INVALID_ARGS: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
