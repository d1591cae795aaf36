/**
 * A single addressable cluster member and its configuration variables.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { CONNECTION_ADDRESS_KEY, type VariableDocument, type VariableValue } from './types.js';

/**
 * One machine in the virtual cluster.
 *
 * Group membership compares nodes by instance, never by name or address.
 *
 * @example
 * ```typescript
 * const node = new ClusterNode('foo0', '10.0.0.1', logger);
 * node.addVariable('zookeeper_id', 1);
 * node.toVariableDocument(); // { ansible_ssh_host: '10.0.0.1', zookeeper_id: 1 }
 * ```
 */
export class ClusterNode {
  /** Inventory name, `<cluster-name><ordinal>`. */
  public readonly name: string;
  /** Connection endpoint, usually an IP address. */
  public readonly address: string;

  private readonly variables = new Map<string, VariableValue>();
  private readonly logger: Logger;

  constructor(name: string, address: string, logger: Logger) {
    this.name = name;
    this.address = address;
    this.logger = logger;
  }

  /**
   * Sets a variable, replacing any previous value.
   *
   * Replacing an existing key is reported as a `variable_overwritten`
   * warning carrying the previous value.
   *
   * @param key - Variable name.
   * @param value - Value emitted into the variable file.
   */
  addVariable(key: string, value: VariableValue): void {
    if (this.variables.has(key)) {
      this.logger.warn('variable_overwritten', {
        node: this.name,
        key,
        previous: this.variables.get(key),
        value,
      });
    }
    this.variables.set(key, value);
  }

  /**
   * Returns a variable's value, or undefined if it was never set.
   */
  getVariable(key: string): VariableValue | undefined {
    return this.variables.get(key);
  }

  /**
   * Variables in the order they were first set.
   */
  get variableEntries(): ReadonlyMap<string, VariableValue> {
    return this.variables;
  }

  /**
   * Builds the document written to this node's variable file.
   *
   * A variable explicitly named `ansible_ssh_host` replaces the address.
   */
  toVariableDocument(): VariableDocument {
    const entries: [string, VariableValue][] = [
      [CONNECTION_ADDRESS_KEY, this.address],
      ...this.variables,
    ];
    return Object.fromEntries(entries);
  }
}
