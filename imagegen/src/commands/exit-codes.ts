import { CliUsageError, ImagegenError } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  GENERATION_FAILED: 1,
  INPUT_INVALID: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Config and placeholder problems are the caller's input; fetch and integrity failures are run failures. */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CliUsageError) return EXIT.INVALID_ARGS;
  if (error instanceof ImagegenError && (error.code === "CONFIG" || error.code === "SUBSTITUTION")) {
    return EXIT.INPUT_INVALID;
  }
  return EXIT.GENERATION_FAILED;
}
