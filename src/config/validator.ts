/**
 * Semantic validation for configuration values.
 *
 * Checks what type checking in the parser cannot: cluster names must be
 * usable as file-name prefixes and the output root must be set.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Explains why a cluster name cannot be used, or returns undefined if it can.
 *
 * Node names, and so variable file names, start with the cluster name.
 *
 * @param name - Candidate cluster name.
 *
 * @example
 * ```typescript
 * clusterNameProblem('lab'); // undefined
 * clusterNameProblem('a/b'); // "must not contain path separators"
 * ```
 */
export function clusterNameProblem(name: string): string | undefined {
  if (name.length === 0) {
    return 'must not be empty';
  }
  if (name.includes('/') || name.includes('\\')) {
    return 'must not contain path separators';
  }
  if (name.includes('\0')) {
    return 'must not contain null bytes';
  }
  if (name === '.' || name === '..') {
    return 'must not be a relative directory name';
  }
  return undefined;
}

/**
 * Validates configuration values semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with all errors found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  const nameProblem = clusterNameProblem(config.cluster.name);
  if (nameProblem !== undefined) {
    errors.push({
      field: 'cluster.name',
      value: config.cluster.name,
      message: `Cluster name ${nameProblem}`,
    });
  }

  if (config.output.root.length === 0) {
    errors.push({
      field: 'output.root',
      value: config.output.root,
      message: 'Output root must not be empty',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
