/**
 * Cluster topology model, role assignment and inventory serializers.
 *
 * @packageDocumentation
 */

export { ClusterNode } from './node.js';
export { GroupTable } from './group-table.js';
export {
  GROUP_NAMES,
  ROLE_CATALOGUE,
  ZOOKEEPER_ID_VARIABLE,
  minimumNodes,
} from './roles.js';
export { assignTopology, checkCapacity } from './assignment.js';
export type { AssignmentOptions, Topology } from './assignment.js';
export {
  parseMembership,
  prepareInventoryFile,
  prepareOutputDirectory,
  renderVariableDocument,
  serializeMembership,
  writeVariableFiles,
} from './serializer.js';
export {
  CONNECTION_ADDRESS_KEY,
  ConfigurationError,
  type ConfigurationErrorCode,
  type MembershipSource,
  type RoleCount,
  type RoleRequirement,
  type VariableDocument,
  type VariableValue,
} from './types.js';
