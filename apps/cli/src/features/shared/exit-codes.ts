/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input or rules file not found */
  NOT_FOUND: 4,

  /** A record did not satisfy a rule (missing column, bad template field) */
  VALIDATION_ERROR: 8,

  /** Invalid rules file or pipeline configuration */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
