/**
 * Serializers for the two inventory outputs: the grouped membership
 * listing and the per-node variable files.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import type { Logger } from '../utils/logger.js';
import {
  inspectPathSync,
  safeExistsSync,
  safeMkdirSync,
  safeWriteFileSync,
  validatePath,
} from '../utils/safe-fs.js';
import type { ClusterNode } from './node.js';
import { ConfigurationError, type MembershipSource } from './types.js';

/**
 * Renders group membership as `[group]` blocks, one member name per line,
 * each block terminated by a blank line.
 *
 * @param source - Groups to render.
 * @returns The listing text.
 *
 * @example
 * ```text
 * [zookeepernodes]
 * foo0
 *
 * [datanodes]
 * foo0
 * foo1
 *
 * ```
 */
export function serializeMembership(source: MembershipSource): string {
  let text = '';
  for (const group of source.groupNames()) {
    text += `[${group}]\n`;
    for (const member of source.memberNames(group)) {
      text += `${member}\n`;
    }
    text += '\n';
  }
  return text;
}

/**
 * Parses a membership listing back into group names and member names.
 *
 * Blank lines are ignored; member lines before the first header are dropped.
 *
 * @param text - Listing produced by {@link serializeMembership}.
 * @returns Member names per group, in listing order.
 */
export function parseMembership(text: string): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  let current: string[] | undefined;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }

    const header = /^\[(.+)\]$/.exec(line);
    if (header?.[1] !== undefined) {
      const name = header[1];
      current = groups.get(name);
      if (current === undefined) {
        current = [];
        groups.set(name, current);
      }
      continue;
    }

    current?.push(line);
  }

  return groups;
}

/**
 * Renders a node's variable document as YAML.
 *
 * Written as YAML 1.1, the version Ansible reads, so scalars such as `no`,
 * `1:30` or a long-form IPv6 address are quoted and stay strings.
 */
export function renderVariableDocument(node: ClusterNode): string {
  return stringifyYaml(node.toVariableDocument(), { version: '1.1' });
}

/**
 * Creates `directory` and any missing parents, then reports whether a
 * directory now occupies the path. A file in the parent chain yields false.
 */
function ensureDirectory(directory: string): boolean {
  if (inspectPathSync(directory) === 'missing') {
    try {
      safeMkdirSync(directory, { recursive: true });
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'EEXIST' && code !== 'ENOTDIR') {
        throw error;
      }
    }
  }
  return inspectPathSync(directory) === 'directory';
}

/**
 * Creates the output directory if needed and checks that it is one.
 *
 * @param outputDirectory - Directory to prepare.
 * @returns The absolute directory path.
 * @throws ConfigurationError if the path, or one of its parents, is not a directory.
 */
export function prepareOutputDirectory(outputDirectory: string): string {
  const resolved = validatePath(outputDirectory);

  if (!ensureDirectory(resolved)) {
    throw new ConfigurationError(
      `Output path exists and is not a directory: ${resolved}`,
      'output_not_directory',
      { path: resolved }
    );
  }

  return resolved;
}

/**
 * Makes sure the membership listing can be written to `inventoryPath`:
 * its parent directories exist and the path itself is not a directory.
 *
 * @param inventoryPath - File that will receive the listing.
 * @returns The absolute file path.
 * @throws ConfigurationError with code `inventory_not_writable` otherwise.
 */
export function prepareInventoryFile(inventoryPath: string): string {
  const resolved = validatePath(inventoryPath);
  const parent = path.dirname(resolved);

  if (!ensureDirectory(parent)) {
    throw new ConfigurationError(
      `Inventory directory exists and is not a directory: ${parent}`,
      'inventory_not_writable',
      { path: parent }
    );
  }

  const kind = inspectPathSync(resolved);
  if (kind !== 'missing' && kind !== 'file') {
    throw new ConfigurationError(
      `Inventory path exists and is not a regular file: ${resolved}`,
      'inventory_not_writable',
      { path: resolved }
    );
  }

  return resolved;
}

/**
 * Writes `<outputDirectory>/<node.name>` for every node.
 *
 * Existing files are replaced and reported as `variable_file_overwritten`.
 *
 * @param nodes - Nodes to write; order does not affect the result.
 * @param outputDirectory - Directory receiving the files.
 * @param logger - Receives overwrite anomalies.
 * @returns Paths of the files written.
 * @throws ConfigurationError if `outputDirectory` is not a directory.
 */
export function writeVariableFiles(
  nodes: Iterable<ClusterNode>,
  outputDirectory: string,
  logger: Logger
): string[] {
  const directory = prepareOutputDirectory(outputDirectory);
  const written: string[] = [];

  for (const node of nodes) {
    const filePath = path.join(directory, node.name);
    if (safeExistsSync(filePath)) {
      logger.warn('variable_file_overwritten', { node: node.name, path: filePath });
    }
    safeWriteFileSync(filePath, renderVariableDocument(node));
    logger.debug('variable_file_written', { node: node.name, path: filePath });
    written.push(filePath);
  }

  return written;
}
