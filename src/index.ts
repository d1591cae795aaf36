/**
 * vcluster-inventory
 *
 * Assigns cluster roles to node addresses and renders an Ansible
 * inventory: a group membership listing plus per-node host_vars files.
 *
 * @example
 * ```typescript
 * import { assignTopology, Logger } from 'vcluster-inventory';
 *
 * const { groups } = assignTopology({
 *   clusterName: 'lab',
 *   addresses: ['10.0.0.1', '10.0.0.2'],
 *   logger: new Logger({ component: 'lab' }),
 * });
 * process.stdout.write(groups.serializeMembership());
 * ```
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './topology/index.js';
export * from './config/index.js';
export {
  Logger,
  createMemoryLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './utils/logger.js';
