/**
 * CLI error handling and exit code mapping
 */

import { NotFoundError } from "@lookup-intern/sdk";

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/store/unknown error
 * - 2: entry not found
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof NotFoundError) {
    return 2;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
