/**
 * Types for the cluster topology model.
 *
 * @packageDocumentation
 */

/**
 * A value that can be attached to a node and emitted into its variable file.
 */
export type VariableValue =
  | string
  | number
  | boolean
  | readonly VariableValue[]
  | { readonly [key: string]: VariableValue };

/**
 * The mapping written to a node's variable file.
 */
export type VariableDocument = Record<string, VariableValue>;

/**
 * Key of the connection address in every variable document. Read by the
 * playbook runner to reach the node.
 */
export const CONNECTION_ADDRESS_KEY = 'ansible_ssh_host';

/**
 * How many nodes a role takes from the front of the input list.
 * `'all'` takes every node.
 */
export type RoleCount = number | 'all';

/**
 * One entry of the role catalogue.
 */
export interface RoleRequirement {
  /** Primitive group the role's nodes are placed in. */
  readonly group: string;
  /** Nodes taken from the beginning of the input list. */
  readonly count: RoleCount;
  /** Meta-group the primitive group is unioned into right after placement. */
  readonly metaGroup?: string;
  /** Variable set on each member to its 1-based position within the role. */
  readonly indexVariable?: string;
}

/**
 * Read-only view of group membership, consumed by the membership serializer.
 */
export interface MembershipSource {
  /** Group names in order of first creation. */
  groupNames(): readonly string[];
  /** Member names of a group in insertion order. */
  memberNames(group: string): readonly string[];
}

/**
 * Error codes for fatal topology conditions.
 */
export type ConfigurationErrorCode =
  | 'insufficient_nodes'
  | 'output_not_directory'
  | 'inventory_not_writable';

/**
 * Fatal condition that aborts a generation run.
 */
export class ConfigurationError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ConfigurationErrorCode;
  /** Additional structured details about the error. */
  public readonly details: Readonly<Record<string, string | number>>;

  constructor(
    message: string,
    code: ConfigurationErrorCode,
    details: Readonly<Record<string, string | number>> = {}
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.details = details;
  }
}
