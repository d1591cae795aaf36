/**
 * Assignment of input addresses to cluster roles.
 *
 * Each role takes its nodes from the beginning of the address list, so
 * roles overlap on small clusters: a single node serves every role.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { GroupTable } from './group-table.js';
import { ClusterNode } from './node.js';
import { ROLE_CATALOGUE, minimumNodes } from './roles.js';
import { ConfigurationError, type RoleRequirement } from './types.js';

/**
 * Input to {@link assignTopology}.
 */
export interface AssignmentOptions {
  /** Prefix of every node name. */
  readonly clusterName: string;
  /** Connection addresses in operator order. */
  readonly addresses: readonly string[];
  /** Receives anomalies and progress events. */
  readonly logger: Logger;
  /** Roles to assign; defaults to {@link ROLE_CATALOGUE}. */
  readonly catalogue?: readonly RoleRequirement[];
}

/**
 * Result of an assignment run.
 */
export interface Topology {
  readonly clusterName: string;
  /** One node per input address, in input order. */
  readonly nodes: readonly ClusterNode[];
  readonly groups: GroupTable;
}

/**
 * Throws if any role needs more nodes than are available.
 *
 * @throws ConfigurationError with code `insufficient_nodes`.
 */
export function checkCapacity(catalogue: readonly RoleRequirement[], available: number): void {
  for (const role of catalogue) {
    const required = minimumNodes(role);
    if (available < required) {
      throw new ConfigurationError(
        `Insufficient nodes: role '${role.group}' requires ${String(required)} node(s), ` +
          `got ${String(available)}`,
        'insufficient_nodes',
        { role: role.group, required, available }
      );
    }
  }
}

/**
 * Builds the cluster topology for a list of addresses.
 *
 * Node `i` is named `<clusterName><i>`. Roles are walked in catalogue
 * order; a role with a meta-group is unioned into it before the next role
 * is placed.
 *
 * @param options - Cluster name, addresses and logger.
 * @returns The nodes and their groups.
 * @throws ConfigurationError if the address list is too short for any role.
 *
 * @example
 * ```typescript
 * const { groups } = assignTopology({
 *   clusterName: 'foo',
 *   addresses: ['10.0.0.1', '10.0.0.2', '10.0.0.3'],
 *   logger,
 * });
 * groups.memberNames('hadoopnodes'); // ['foo0', 'foo1', 'foo2']
 * ```
 */
export function assignTopology(options: AssignmentOptions): Topology {
  const { clusterName, addresses, logger } = options;
  const catalogue = options.catalogue ?? ROLE_CATALOGUE;

  checkCapacity(catalogue, addresses.length);

  const nodes = addresses.map(
    (address, ordinal) => new ClusterNode(`${clusterName}${String(ordinal)}`, address, logger)
  );
  const groups = new GroupTable(logger);

  for (const role of catalogue) {
    const members = role.count === 'all' ? nodes : nodes.slice(0, role.count);

    members.forEach((node, index) => {
      groups.addNode(role.group, node);
      if (role.indexVariable !== undefined) {
        node.addVariable(role.indexVariable, index + 1);
      }
    });

    if (role.metaGroup !== undefined) {
      groups.unionInto(role.group, role.metaGroup);
    }

    logger.debug('role_assigned', {
      group: role.group,
      members: members.map((node) => node.name),
      ...(role.metaGroup !== undefined ? { metaGroup: role.metaGroup } : {}),
    });
  }

  return { clusterName, nodes, groups };
}
