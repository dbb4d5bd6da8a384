/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: record not found
 * - 3: record logically deleted
 */
export const EXIT_NOT_FOUND = 2;
export const EXIT_DELETED = 3;

/**
 * Map SDK and commander errors to CLI exit codes
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  // Includes InvalidArgumentError and help/version exits (code 0)
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  // SDK errors (invalid records, unresolvable positions) and anything else
  return 1;
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
      message += `\n  Cause: ${error.cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
