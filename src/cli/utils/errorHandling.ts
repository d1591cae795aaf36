/**
 * Shared error handling utilities for CLI commands.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * - On success: exits with the result's exit code
 * - On error: prints the error message and exits with 1
 *
 * @param fn - The command to run.
 */
export function withErrorHandling(fn: () => CliCommandResult): void {
  try {
    const result = fn();
    process.exitCode = result.exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error(`Error: ${String(error)}`);
    }
    process.exitCode = 1;
  }
}
