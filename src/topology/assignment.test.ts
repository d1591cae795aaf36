import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createMemoryLogger } from '../utils/logger.js';
import { assignTopology, checkCapacity } from './assignment.js';
import { GROUP_NAMES, ROLE_CATALOGUE } from './roles.js';
import { ConfigurationError, type RoleRequirement } from './types.js';

const ALL_GROUPS = [
  'zookeepernodes',
  'namenodes',
  'hadoopnodes',
  'journalnodes',
  'historyservernodes',
  'resourcemanagernodes',
  'frontendnodes',
  'monitornodes',
  'datanodes',
];

const addressArb = fc.ipV4();

describe('assignTopology', () => {
  describe('three-node cluster', () => {
    const { logger, entries } = createMemoryLogger('test');
    const topology = assignTopology({
      clusterName: 'foo',
      addresses: ['10.0.0.1', '10.0.0.2', '10.0.0.3'],
      logger,
    });
    const { groups } = topology;

    it('should name nodes by cluster name and ordinal', () => {
      expect(topology.nodes.map((n) => n.name)).toEqual(['foo0', 'foo1', 'foo2']);
      expect(topology.nodes.map((n) => n.address)).toEqual(['10.0.0.1', '10.0.0.2', '10.0.0.3']);
    });

    it('should create groups in catalogue order with the meta-group after namenodes', () => {
      expect(groups.groupNames()).toEqual(ALL_GROUPS);
    });

    it('should put the first node in every single-node role', () => {
      for (const group of [
        'zookeepernodes',
        'namenodes',
        'journalnodes',
        'historyservernodes',
        'resourcemanagernodes',
        'frontendnodes',
        'monitornodes',
      ]) {
        expect(groups.memberNames(group)).toEqual(['foo0']);
      }
    });

    it('should put every node in datanodes and hadoopnodes', () => {
      expect(groups.memberNames('datanodes')).toEqual(['foo0', 'foo1', 'foo2']);
      expect(groups.memberNames('hadoopnodes')).toEqual(['foo0', 'foo1', 'foo2']);
    });

    it('should give only the coordination node a zookeeper id', () => {
      expect(topology.nodes[0]?.toVariableDocument()).toEqual({
        ansible_ssh_host: '10.0.0.1',
        zookeeper_id: 1,
      });
      expect(topology.nodes[1]?.toVariableDocument()).toEqual({ ansible_ssh_host: '10.0.0.2' });
    });

    it('should render the membership listing', () => {
      expect(groups.serializeMembership()).toBe(
        '[zookeepernodes]\nfoo0\n\n' +
          '[namenodes]\nfoo0\n\n' +
          '[hadoopnodes]\nfoo0\nfoo1\nfoo2\n\n' +
          '[journalnodes]\nfoo0\n\n' +
          '[historyservernodes]\nfoo0\n\n' +
          '[resourcemanagernodes]\nfoo0\n\n' +
          '[frontendnodes]\nfoo0\n\n' +
          '[monitornodes]\nfoo0\n\n' +
          '[datanodes]\nfoo0\nfoo1\nfoo2\n\n'
      );
    });

    it('should report no anomalies', () => {
      expect(entries).toEqual([]);
    });
  });

  it('hadoopnodes holds only the first node before the worker role runs', () => {
    const { logger } = createMemoryLogger('test');
    const withoutWorkers = ROLE_CATALOGUE.filter((role) => role.group !== GROUP_NAMES.datanode);

    const { groups } = assignTopology({
      clusterName: 'foo',
      addresses: ['10.0.0.1', '10.0.0.2', '10.0.0.3'],
      logger,
      catalogue: withoutWorkers,
    });

    expect(groups.memberNames('hadoopnodes')).toEqual(['foo0']);
    expect(groups.has('datanodes')).toBe(false);
  });

  it('should place a single node in every group', () => {
    const { logger } = createMemoryLogger('test');
    const { groups, nodes } = assignTopology({
      clusterName: 'solo',
      addresses: ['192.168.1.5'],
      logger,
    });

    for (const group of ALL_GROUPS) {
      expect(groups.members(group)).toEqual(nodes);
    }
  });

  it('should fail with insufficient_nodes for an empty address list', () => {
    const { logger } = createMemoryLogger('test');

    expect(() => assignTopology({ clusterName: 'foo', addresses: [], logger })).toThrow(
      ConfigurationError
    );

    try {
      assignTopology({ clusterName: 'foo', addresses: [], logger });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('insufficient_nodes');
        expect(error.details).toEqual({ role: 'zookeepernodes', required: 1, available: 0 });
        expect(error.message).toBe(
          "Insufficient nodes: role 'zookeepernodes' requires 1 node(s), got 0"
        );
      }
    }
  });

  it('should emit a role_assigned debug event per role', () => {
    const { logger, entries } = createMemoryLogger('test', true);

    assignTopology({ clusterName: 'foo', addresses: ['10.0.0.1', '10.0.0.2'], logger });

    const events = entries.filter((entry) => entry.event === 'role_assigned');
    expect(events.map((entry) => entry.data?.group)).toEqual(
      ROLE_CATALOGUE.map((role) => role.group)
    );
    expect(events[7]?.data).toEqual({
      group: 'datanodes',
      members: ['foo0', 'foo1'],
      metaGroup: 'hadoopnodes',
    });
  });

  describe('properties', () => {
    it('names node i <cluster><i> with the i-th address', () => {
      fc.assert(
        fc.property(
          fc.array(addressArb, { minLength: 1, maxLength: 12 }),
          fc.stringMatching(/^[a-z][a-z0-9-]{0,8}$/),
          (addresses, clusterName) => {
            const { logger } = createMemoryLogger('test');
            const { nodes } = assignTopology({ clusterName, addresses, logger });

            expect(nodes).toHaveLength(addresses.length);
            nodes.forEach((node, i) => {
              expect(node.name).toBe(`${clusterName}${String(i)}`);
              expect(node.address).toBe(addresses[i]);
            });
            expect(new Set(nodes.map((n) => n.name)).size).toBe(nodes.length);
          }
        )
      );
    });

    it('datanodes and hadoopnodes contain all k nodes in order', () => {
      fc.assert(
        fc.property(fc.array(addressArb, { minLength: 1, maxLength: 12 }), (addresses) => {
          const { logger } = createMemoryLogger('test');
          const { nodes, groups } = assignTopology({ clusterName: 'c', addresses, logger });

          expect(groups.members('datanodes')).toEqual(nodes);
          expect(groups.members('hadoopnodes')).toEqual(nodes);
          expect(groups.nodes()).toHaveLength(addresses.length);
        })
      );
    });

    it('duplicate addresses still yield distinct nodes', () => {
      const { logger } = createMemoryLogger('test');
      const { groups } = assignTopology({
        clusterName: 'dup',
        addresses: ['10.0.0.9', '10.0.0.9'],
        logger,
      });

      expect(groups.memberNames('datanodes')).toEqual(['dup0', 'dup1']);
    });
  });
});

describe('checkCapacity', () => {
  const catalogue: RoleRequirement[] = [
    { group: 'small', count: 1 },
    { group: 'large', count: 3 },
    { group: 'everyone', count: 'all' },
  ];

  it('should accept enough nodes', () => {
    expect(() => checkCapacity(catalogue, 3)).not.toThrow();
  });

  it('should name the first role that cannot be filled', () => {
    expect(() => checkCapacity(catalogue, 2)).toThrow(
      "Insufficient nodes: role 'large' requires 3 node(s), got 2"
    );
  });

  it('should require at least one node for an all-nodes role', () => {
    expect(() => checkCapacity([{ group: 'everyone', count: 'all' }], 0)).toThrow(
      ConfigurationError
    );
  });
});
