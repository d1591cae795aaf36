/**
 * Error suggestion system for the vcluster CLI.
 *
 * Provides contextual suggestions based on error types to help operators
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { ConfigurationError } from '../topology/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { UsageError } from './args.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types that can occur during a generate run.
 */
export type ErrorType =
  | 'insufficient_nodes'
  | 'output_not_directory'
  | 'inventory_not_writable'
  | 'invalid_config'
  | 'usage'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** Offending path. */
    path?: string;
    /** Role that could not be filled. */
    role?: string;
    /** Nodes the role requires. */
    required?: number;
    /** Nodes that were given. */
    available?: number;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  insufficient_nodes: [
    {
      text: 'Pass at least one node address per required role',
      action: 'vcluster generate 10.0.0.1 10.0.0.2 10.0.0.3',
    },
    {
      text: 'Roles share nodes, so a single address is enough for a minimal cluster',
    },
  ],

  output_not_directory: [
    {
      text: 'Point the output root at a directory',
      action: 'vcluster generate --output <dir> <address>...',
    },
    {
      text: 'Move or remove the file occupying host_vars',
      action: 'ls -l host_vars',
    },
  ],

  inventory_not_writable: [
    {
      text: 'Point --inventory at a file whose parent directories can be created',
      action: 'vcluster generate --inventory <dir>/hosts <address>...',
    },
    {
      text: 'Move or remove the file or directory blocking the inventory path',
    },
  ],

  invalid_config: [
    {
      text: 'Check vcluster.toml for syntax errors and field types',
    },
    {
      text: 'Check VCLUSTER_* environment variables',
      action: 'env | grep ^VCLUSTER_',
    },
  ],

  usage: [
    {
      text: 'Show usage for the generate command',
      action: 'vcluster help generate',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'vcluster generate --debug <address>...',
    },
  ],
};

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (lowerMessage.includes('insufficient nodes')) {
    return 'insufficient_nodes';
  }

  if (lowerMessage.includes('output path exists')) {
    return 'output_not_directory';
  }

  if (
    lowerMessage.includes('inventory path exists') ||
    lowerMessage.includes('inventory directory exists')
  ) {
    return 'inventory_not_writable';
  }

  if (
    lowerMessage.includes('toml') ||
    lowerMessage.includes('config') ||
    lowerMessage.includes('environment variable') ||
    lowerMessage.includes('coerce')
  ) {
    return 'invalid_config';
  }

  if (lowerMessage.includes('option') || lowerMessage.includes('address is required')) {
    return 'usage';
  }

  return 'unknown';
}

/**
 * Builds the error context for a thrown value.
 *
 * @param error - The thrown value.
 * @returns Context used to pick suggestions.
 */
export function classifyError(error: unknown): ErrorContext {
  if (error instanceof ConfigurationError) {
    const { path, role, required, available } = error.details;
    return {
      errorType: error.code,
      details: {
        ...(typeof path === 'string' ? { path } : {}),
        ...(typeof role === 'string' ? { role } : {}),
        ...(typeof required === 'number' ? { required } : {}),
        ...(typeof available === 'number' ? { available } : {}),
      },
    };
  }

  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return { errorType: 'invalid_config' };
  }

  if (error instanceof UsageError) {
    return { errorType: 'usage' };
  }

  if (error instanceof PathValidationError) {
    return { errorType: 'usage', details: { path: error.invalidPath } };
  }

  return { errorType: inferErrorType(error instanceof Error ? error.message : String(error)) };
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = ERROR_SUGGESTIONS[errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.path !== undefined) {
    result += `\n  ${yellowCode}Path:${resetCode} ${context.details.path}`;
  }

  if (context.details?.role !== undefined) {
    result += `\n  ${yellowCode}Role:${resetCode} ${context.details.role}`;
    if (context.details.required !== undefined && context.details.available !== undefined) {
      result += ` (needs ${String(context.details.required)}, got ${String(context.details.available)})`;
    }
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Displays error message with suggestions on stderr.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}
