/**
 * Configuration module for vcluster.toml parsing and validation.
 *
 * Override precedence: command line > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, loadConfigFile, parseConfig } from './parser.js';
export type {
  ClusterSettings,
  Config,
  LoggingSettings,
  OutputSettings,
  PartialConfig,
} from './types.js';
export {
  DEFAULT_CLUSTER,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
} from './defaults.js';
export {
  ConfigValidationError,
  assertConfigValid,
  clusterNameProblem,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
