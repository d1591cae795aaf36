/**
 * The fixed role catalogue.
 *
 * Group names are read by the downstream playbooks (for example the HBase
 * add-on installs on `hadoopnodes`, runs RegionServers on `datanodes`,
 * masters on `namenodes` and builds its quorum from `zookeepernodes`), so
 * they must not change.
 *
 * @packageDocumentation
 */

import type { RoleRequirement } from './types.js';

/**
 * Group names shared with the playbook layer.
 */
export const GROUP_NAMES = {
  zookeeper: 'zookeepernodes',
  namenode: 'namenodes',
  journalnode: 'journalnodes',
  historyserver: 'historyservernodes',
  resourcemanager: 'resourcemanagernodes',
  frontend: 'frontendnodes',
  monitor: 'monitornodes',
  datanode: 'datanodes',
  hadoop: 'hadoopnodes',
} as const;

/**
 * Variable holding each coordination node's 1-based id.
 */
export const ZOOKEEPER_ID_VARIABLE = 'zookeeper_id';

/**
 * Roles in the order they are assigned.
 */
export const ROLE_CATALOGUE: readonly RoleRequirement[] = [
  { group: GROUP_NAMES.zookeeper, count: 1, indexVariable: ZOOKEEPER_ID_VARIABLE },
  { group: GROUP_NAMES.namenode, count: 1, metaGroup: GROUP_NAMES.hadoop },
  { group: GROUP_NAMES.journalnode, count: 1, metaGroup: GROUP_NAMES.hadoop },
  { group: GROUP_NAMES.historyserver, count: 1, metaGroup: GROUP_NAMES.hadoop },
  { group: GROUP_NAMES.resourcemanager, count: 1, metaGroup: GROUP_NAMES.hadoop },
  { group: GROUP_NAMES.frontend, count: 1 },
  { group: GROUP_NAMES.monitor, count: 1 },
  { group: GROUP_NAMES.datanode, count: 'all', metaGroup: GROUP_NAMES.hadoop },
];

/**
 * Smallest node count a role accepts. A role that takes every node still
 * needs at least one.
 */
export function minimumNodes(role: RoleRequirement): number {
  return role.count === 'all' ? 1 : role.count;
}
