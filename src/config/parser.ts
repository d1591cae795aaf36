/**
 * TOML configuration parser for vcluster.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { safeExistsSync, safeReadTextFileSync } from '../utils/safe-fs.js';
import { DEFAULT_CLUSTER, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
import type { ClusterSettings, Config, LoggingSettings, OutputSettings } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Narrows a TOML section to a table.
 *
 * @param value - Raw section value.
 * @param section - Section name for error messages.
 * @returns The table, or undefined if the section is absent.
 * @throws ConfigParseError if the section is present but not a table.
 */
function asTable(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table`);
  }
  return Object.fromEntries(Object.entries(value));
}

function parseCluster(raw: Record<string, unknown> | undefined): ClusterSettings {
  const result: ClusterSettings = { ...DEFAULT_CLUSTER };
  if (raw === undefined) {
    return result;
  }

  if ('name' in raw) {
    result.name = validateString(raw.name, 'cluster.name');
  }

  return result;
}

function parseOutput(raw: Record<string, unknown> | undefined): OutputSettings {
  const result: OutputSettings = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('root' in raw) {
    result.root = validateString(raw.root, 'output.root');
  }
  if ('inventory' in raw) {
    result.inventory = validateString(raw.inventory, 'output.inventory');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Missing sections and fields take their defaults; unknown keys are ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or fields of the wrong type.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [cluster]
 * name = "lab"
 * `);
 * console.log(config.cluster.name); // "lab"
 * console.log(config.output.root); // "."
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    cluster: parseCluster(asTable(parsed.cluster, 'cluster')),
    output: parseOutput(asTable(parsed.output, 'output')),
    logging: parseLogging(asTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    cluster: { ...DEFAULT_CONFIG.cluster },
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Reads and parses a configuration file.
 *
 * @param filePath - Path of the TOML file.
 * @param required - When false, a missing file yields the defaults.
 * @returns The parsed configuration.
 * @throws ConfigParseError if a required file is missing or the file is invalid.
 */
export function loadConfigFile(filePath: string, required: boolean): Config {
  if (!safeExistsSync(filePath)) {
    if (required) {
      throw new ConfigParseError(`Config file not found: ${filePath}`);
    }
    return getDefaultConfig();
  }

  let content: string;
  try {
    content = safeReadTextFileSync(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read config file ${filePath}: ${cause.message}`, cause);
  }

  return parseConfig(content);
}
