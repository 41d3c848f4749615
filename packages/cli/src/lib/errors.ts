/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  ConfigurationError,
  IntegrityViolationError,
  LookupError,
  StorageError,
} from "@prefixwatch/sdk";

/**
 * Process exit codes
 * - 0: success
 * - 1: usage/configuration/storage/unknown error
 * - 2: source or shard not registered
 * - 3: a fan-out left some shards failed
 * - 4: stored hash integrity violation
 */
export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Lookup: 2,
  Incomplete: 3,
  Integrity: 4,
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
 * Map SDK errors to CLI exit codes
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof LookupError) {
    return ExitCode.Lookup;
  }

  if (error instanceof IntegrityViolationError) {
    return ExitCode.Integrity;
  }

  if (error instanceof ConfigurationError || error instanceof StorageError) {
    return ExitCode.Failure;
  }

  // Default to exit code 1 for unknown errors
  return ExitCode.Failure;
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
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
