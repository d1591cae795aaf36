/**
 * Default configuration values for vcluster.toml.
 *
 * @packageDocumentation
 */

import type { ClusterSettings, Config, LoggingSettings, OutputSettings } from './types.js';

/**
 * File read from the working directory when no `--config` is given.
 */
export const DEFAULT_CONFIG_FILE = 'vcluster.toml';

export const DEFAULT_CLUSTER: ClusterSettings = {
  name: 'vcluster',
};

/**
 * Output goes to the working directory; no inventory file by default.
 */
export const DEFAULT_OUTPUT: OutputSettings = {
  root: '.',
  inventory: '',
};

export const DEFAULT_LOGGING: LoggingSettings = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  cluster: DEFAULT_CLUSTER,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
