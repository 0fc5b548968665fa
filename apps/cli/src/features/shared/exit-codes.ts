/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,

  /** Catch-all */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options, including batch size limits */
  INVALID_ARGS: 2,

  /** An address could not be converted */
  VALIDATION_ERROR: 8,

  /** Environment configuration is invalid */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const ERROR_CODES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  8: 'VALIDATION_ERROR',
  11: 'CONFIG_ERROR',
};

/**
 * Map exit code to the error code string used in JSON output.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}
