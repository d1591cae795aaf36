/**
 * Generate command handler for the vcluster CLI.
 *
 * Assigns roles to the given addresses, writes `host_vars/<node>` files
 * under the output root and prints the membership listing.
 */

import * as path from 'node:path';
import {
  DEFAULT_CONFIG_FILE,
  applyEnvOverrides,
  assertConfigValid,
  loadConfigFile,
  mergeConfig,
  type Config,
  type PartialConfig,
} from '../../config/index.js';
import {
  ConfigurationError,
  assignTopology,
  prepareInventoryFile,
  prepareOutputDirectory,
} from '../../topology/index.js';
import { Logger } from '../../utils/logger.js';
import { resolveUserPath, safeWriteFileSync } from '../../utils/safe-fs.js';
import { parseGenerateArgs, type GenerateOptions } from '../args.js';
import { classifyError, displayErrorWithSuggestions } from '../errors.js';
import { GENERATE_HELP } from '../help.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Directory under the output root holding per-node variable files.
 */
export const HOST_VARS_DIR = 'host_vars';

/**
 * Resolves the effective configuration: flags > env > file > defaults.
 *
 * @param options - Parsed command-line options.
 * @param context - CLI context supplying the environment.
 * @returns The validated configuration.
 */
export function resolveConfig(options: GenerateOptions, context: CliContext): Config {
  const explicitFile = options.config !== undefined;
  const filePath = resolveUserPath(options.config ?? DEFAULT_CONFIG_FILE, context.env);

  const fromFile = loadConfigFile(filePath, explicitFile);
  const withEnv = applyEnvOverrides(fromFile, context.env);

  const flags: PartialConfig = {
    cluster: options.name !== undefined ? { name: options.name } : {},
    output: {
      ...(options.output !== undefined ? { root: options.output } : {}),
      ...(options.inventory !== undefined ? { inventory: options.inventory } : {}),
    },
    logging: options.debug ? { debug: true } : {},
  };
  const config = mergeConfig(withEnv, flags);

  assertConfigValid(config);
  return config;
}

/**
 * Runs a generation with a resolved configuration.
 *
 * @param config - Effective configuration.
 * @param addresses - Node addresses in order.
 * @param context - CLI context.
 * @param logger - Receives anomalies and progress.
 * @throws ConfigurationError for too few nodes or an unusable output or inventory path.
 */
export function runGenerate(
  config: Config,
  addresses: readonly string[],
  context: CliContext,
  logger: Logger
): void {
  const topology = assignTopology({
    clusterName: config.cluster.name,
    addresses,
    logger: logger.child('assignment'),
  });

  // All paths are checked before the first write; stdout comes last.
  const outputRoot = resolveUserPath(config.output.root, context.env);
  const hostVarsDir = prepareOutputDirectory(path.join(outputRoot, HOST_VARS_DIR));
  const inventoryPath =
    config.output.inventory !== ''
      ? prepareInventoryFile(resolveUserPath(config.output.inventory, context.env))
      : undefined;

  const written = topology.groups.writeVariableFiles(hostVarsDir);
  const membership = topology.groups.serializeMembership();

  if (inventoryPath !== undefined) {
    safeWriteFileSync(inventoryPath, membership);
    logger.debug('inventory_written', { path: inventoryPath });
  }

  context.stdout(membership);

  logger.info('topology_generated', {
    cluster: config.cluster.name,
    nodes: topology.nodes.length,
    groups: topology.groups.groupNames().length,
    hostVars: hostVarsDir,
    files: written.length,
  });
}

/**
 * Handles the generate command.
 *
 * Known failures are reported with suggestions and exit code 1;
 * configuration errors are also logged as `configuration_error`.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export function handleGenerateCommand(context: CliContext): CliCommandResult {
  let logger = new Logger({ component: 'vcluster', sink: context.logSink });

  try {
    const options = parseGenerateArgs(context.args);
    if (options.help) {
      context.stdout(`${GENERATE_HELP}\n`);
      return { exitCode: 0 };
    }

    const config = resolveConfig(options, context);
    logger = new Logger({
      component: 'vcluster',
      debugMode: config.logging.debug,
      sink: context.logSink,
    });

    runGenerate(config, options.addresses, context, logger);
    return { exitCode: 0 };
  } catch (error) {
    const errorContext = classifyError(error);
    if (errorContext.errorType === 'unknown') {
      throw error;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof ConfigurationError) {
      logger.error('configuration_error', { code: error.code, message, ...error.details });
    }
    displayErrorWithSuggestions(message, errorContext, context.display);
    return { exitCode: 1, message };
  }
}
