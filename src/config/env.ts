/**
 * Environment variable overrides for configuration.
 *
 * Supports VCLUSTER_* environment variables. Environment variables take
 * precedence over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { section: 'cluster'; field: 'name'; type: 'string'; description: string }
  | { section: 'output'; field: 'root' | 'inventory'; type: 'string'; description: string }
  | { section: 'logging'; field: 'debug'; type: 'boolean'; description: string };

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: VCLUSTER_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * Shortcuts are applied first so that the full names win when both are set.
 */
const ENV_VAR_MAPPINGS: ReadonlyArray<readonly [string, EnvMapping]> = [
  [
    'VCLUSTER_NAME',
    {
      section: 'cluster',
      field: 'name',
      type: 'string',
      description: 'Override the cluster name (shortcut for VCLUSTER_CLUSTER_NAME)',
    },
  ],
  [
    'VCLUSTER_DEBUG',
    {
      section: 'logging',
      field: 'debug',
      type: 'boolean',
      description: 'Enable debug logging (shortcut for VCLUSTER_LOGGING_DEBUG)',
    },
  ],
  [
    'VCLUSTER_CLUSTER_NAME',
    { section: 'cluster', field: 'name', type: 'string', description: 'Override the cluster name' },
  ],
  [
    'VCLUSTER_OUTPUT_ROOT',
    {
      section: 'output',
      field: 'root',
      type: 'string',
      description: 'Override the output root directory',
    },
  ],
  [
    'VCLUSTER_OUTPUT_INVENTORY',
    {
      section: 'output',
      field: 'inventory',
      type: 'string',
      description: 'Also write the membership listing to this file',
    },
  ],
  [
    'VCLUSTER_LOGGING_DEBUG',
    {
      section: 'logging',
      field: 'debug',
      type: 'boolean',
      description: 'Enable debug logging',
    },
  ],
];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

function applyMapping(
  overrides: PartialConfig,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.section) {
    case 'cluster':
      overrides.cluster = { ...overrides.cluster, [mapping.field]: value };
      break;
    case 'output':
      overrides.output = { ...overrides.output, [mapping.field]: value };
      break;
    case 'logging':
      overrides.logging = { ...overrides.logging, [mapping.field]: coerceToBoolean(value, envVar) };
      break;
  }
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty values are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ VCLUSTER_NAME: 'lab' });
 * console.log(result.overrides.cluster?.name); // "lab"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    // eslint-disable-next-line security/detect-object-injection -- envVar comes from the controlled mapping table
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    cluster: { ...base.cluster, ...partial.cluster },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    ENV_VAR_MAPPINGS.map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
