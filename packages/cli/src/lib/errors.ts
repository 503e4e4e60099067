/**
 * CLI error handling and exit code mapping
 */

/**
 * Standard exit codes
 */
export const EXIT_CODE = {
  /** Operation completed */
  SUCCESS: 0,
  /** Conflict, malformed data, store failure or unexpected error */
  FAILURE: 1,
  /** Base secret, part or path not found */
  NOT_FOUND: 2,
  /** Invalid arguments or configuration */
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.FAILURE;
  }
}

const NOT_FOUND_ERRORS = new Set(["BaseNotFoundError", "PartNotFoundError"]);

const INVALID_ARGUMENT_ERRORS = new Set([
  "InvalidArgumentError",
  "CommanderError",
  "InvalidBaseNameError",
  "InvalidMutationError",
]);

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: conflict/merge/partition/store/unknown error
 * - 2: base secret or part not found
 * - 3: invalid arguments
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof Error) {
    const name = error.name || error.constructor.name;

    if (NOT_FOUND_ERRORS.has(name)) {
      return EXIT_CODE.NOT_FOUND;
    }

    if (INVALID_ARGUMENT_ERRORS.has(name)) {
      return EXIT_CODE.INVALID_ARGS;
    }
  }

  return EXIT_CODE.FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
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
