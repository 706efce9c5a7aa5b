/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { displayErrorWithSuggestions, errorContextFor } from '../errors.js';
import type { CliCommandResult } from '../types.js';
import type { DisplayOptions } from './displayUtils.js';

/**
 * Options for {@link executeCommand}.
 */
export interface ErrorHandlingOptions {
  /** Command name shown alongside the error. */
  command?: string;
  /** Display options for the error block. */
  display?: DisplayOptions;
}

/**
 * Runs a command handler and converts any thrown error into exit code 1.
 *
 * The error is printed to stderr with suggestions matching its type.
 *
 * @param fn - The function to run (sync or async).
 * @param options - Command name and display options.
 * @returns The handler's result, or `{ exitCode: 1 }` on error.
 */
export async function executeCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: ErrorHandlingOptions = {}
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    displayErrorWithSuggestions(
      message,
      errorContextFor(error, options.command),
      options.display ?? { colors: true, unicode: true }
    );
    return { exitCode: 1, message };
  }
}

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and exits the process
 * with the result's exit code, or 1 after printing the error.
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Command name and display options.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: ErrorHandlingOptions = {}
): void {
  void executeCommand(fn, options).then((result) => {
    process.exit(result.exitCode);
  });
}
