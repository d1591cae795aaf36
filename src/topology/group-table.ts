/**
 * Named groups of cluster nodes.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import type { ClusterNode } from './node.js';
import { serializeMembership, writeVariableFiles } from './serializer.js';
import type { MembershipSource } from './types.js';

/**
 * Mapping from group name to an ordered, duplicate-free list of nodes.
 *
 * Groups hold references; a node may belong to any number of groups.
 * Groups are listed in the order they were first created and members in
 * the order they were added.
 */
export class GroupTable implements MembershipSource {
  private readonly groups = new Map<string, ClusterNode[]>();
  private readonly allNodes = new Set<ClusterNode>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Appends a node to a group unless it is already a member.
   * The group is created on first use.
   *
   * @param groupName - Target group.
   * @param node - Node to add.
   */
  addNode(groupName: string, node: ClusterNode): void {
    const members = this.ensureGroup(groupName);
    if (!members.includes(node)) {
      members.push(node);
    }
    this.allNodes.add(node);
  }

  /**
   * Adds every current member of `sourceGroup` to `targetGroup`.
   *
   * This copies membership once; nodes added to the source later do not
   * appear in the target. The target group is registered even when the
   * source is absent or empty.
   *
   * @param sourceGroup - Group to copy members from.
   * @param targetGroup - Group receiving the members.
   */
  unionInto(sourceGroup: string, targetGroup: string): void {
    const snapshot = [...(this.groups.get(sourceGroup) ?? [])];
    this.ensureGroup(targetGroup);
    for (const node of snapshot) {
      this.addNode(targetGroup, node);
    }
  }

  /**
   * Whether the group was ever created.
   */
  has(groupName: string): boolean {
    return this.groups.has(groupName);
  }

  groupNames(): readonly string[] {
    return [...this.groups.keys()];
  }

  /**
   * Members of a group in insertion order; empty for unknown groups.
   */
  members(groupName: string): readonly ClusterNode[] {
    return [...(this.groups.get(groupName) ?? [])];
  }

  memberNames(groupName: string): readonly string[] {
    return this.members(groupName).map((node) => node.name);
  }

  /**
   * Every node that was ever added to any group.
   */
  nodes(): readonly ClusterNode[] {
    return [...this.allNodes];
  }

  /**
   * Renders the grouped membership listing.
   */
  serializeMembership(): string {
    return serializeMembership(this);
  }

  /**
   * Writes one variable file per node into `outputDirectory`.
   *
   * @param outputDirectory - Directory receiving the files; created if missing.
   * @returns Paths of the files written.
   * @throws ConfigurationError if `outputDirectory` exists and is not a directory.
   */
  writeVariableFiles(outputDirectory: string): string[] {
    return writeVariableFiles(this.allNodes, outputDirectory, this.logger);
  }

  private ensureGroup(groupName: string): ClusterNode[] {
    let members = this.groups.get(groupName);
    if (members === undefined) {
      members = [];
      this.groups.set(groupName, members);
    }
    return members;
  }
}
