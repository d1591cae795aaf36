/**
 * Configuration types for vcluster.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Cluster naming settings.
 */
export interface ClusterSettings {
  /** Default cluster name; node names are `<name><ordinal>`. */
  name: string;
}

/**
 * Output location settings.
 */
export interface OutputSettings {
  /** Output root; `host_vars/` is created beneath it. */
  root: string;
  /** When non-empty, the membership listing is also written to this file. */
  inventory: string;
}

/**
 * Logging settings.
 */
export interface LoggingSettings {
  /** Whether debug-level events are emitted. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from vcluster.toml.
 */
export interface Config {
  cluster: ClusterSettings;
  output: OutputSettings;
  logging: LoggingSettings;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  cluster?: Partial<ClusterSettings>;
  output?: Partial<OutputSettings>;
  logging?: Partial<LoggingSettings>;
}
