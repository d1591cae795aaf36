/**
 * CLI types and interfaces for the vcluster CLI.
 */

import type { LogSink } from '../utils/logger.js';

/**
 * Terminal display options.
 */
export interface DisplayOptions {
  /**
   * Whether to use ANSI colors in output.
   */
  colors: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  args: string[];

  /**
   * Environment used for config overrides and path expansion.
   */
  env: Record<string, string | undefined>;

  /**
   * Terminal display options.
   */
  display: DisplayOptions;

  /**
   * Receives the membership listing.
   */
  stdout: (text: string) => void;

  /**
   * Receives structured log lines.
   */
  logSink: LogSink;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}
