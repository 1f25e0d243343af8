/**
 * Process exit codes for the farm-profiles CLI
 *
 * @module cli/lib/exit-codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** At least one profile came back failed */
  PARTIAL_FAILURE: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  INVALID_INPUT: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandResult {
  readonly output: string;
  readonly exitCode: ExitCode;
}
