/**
 * CLI error handling and exit code mapping
 */

/**
 * Process exit codes
 * - 0: success
 * - 1: usage/config/IO/unknown error
 * - 2: link not found
 */
export const ExitCode = {
  Ok: 0,
  Failure: 1,
  NotFound: 2,
} as const;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? ExitCode.Failure;
  }
}

/**
 * Map an error to an exit code. SDK errors (configuration, parsing,
 * released handles) are failures; only a CliError picks its own code.
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  return ExitCode.Failure;
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

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
