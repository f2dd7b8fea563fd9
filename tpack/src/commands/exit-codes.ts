/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PACKAGE_FAILED: 1,
  INVALID_ARGS: 2,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
