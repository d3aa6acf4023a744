/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { TrimSeqError } from "@trimseq/core";
import { EXIT_CODE } from "../contracts.js";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.INTERNAL_ERROR;
  }
}

/**
 * Thrown when a benchmark subject breaks the list contract
 */
export class VerificationError extends CliError {
  constructor(
    public readonly subject: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Verification failed for ${subject}: ${detail}`, {
      exitCode: EXIT_CODE.VERIFICATION_FAILED,
      cause: options?.cause,
    });
    this.name = "VerificationError";
  }
}

/** Commander error codes that mean the user got the invocation wrong */
const USAGE_CODES = new Set([
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.unknownOption",
  "commander.unknownCommand",
  "commander.excessArguments",
]);

/**
 * Map errors to CLI exit codes
 * - 0: success (help and version output)
 * - 1: internal or library error
 * - 2: verification failure
 * - 3: invalid arguments
 */
export function mapErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    if (USAGE_CODES.has(error.code)) {
      return EXIT_CODE.INVALID_ARGS;
    }
    return error.exitCode;
  }

  // Library errors (TrimSeqError) and anything unexpected are internal
  return EXIT_CODE.INTERNAL_ERROR;
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

    if (error instanceof TrimSeqError) {
      message = `[${error.code}] ${message}`;
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
