/**
 * @module analyzer/resource-tree.test
 * @description Unit tests for resource tree normalization and summary
 * @status COMPLETE
 * @dependencies src/analyzer/resource-tree.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { isOrphan, summarizeResourceTree, toResourceNodes } from './resource-tree.js';
import { ApplicationTreeSchema, ResourceTreeNodeSchema } from '../types/argocd.js';
import type { ResourceNode } from '../types/summaries.js';

function node(raw: Record<string, unknown>, managed = false): ResourceNode {
  return { ...ResourceTreeNodeSchema.parse(raw), managed };
}

const DEPLOYMENT_REF = { group: 'apps', kind: 'Deployment', name: 'web', namespace: 'shop' };

describe('resource-tree', () => {
  // ==========================================================================
  // toResourceNodes
  // ==========================================================================

  describe('toResourceNodes', () => {
    it('marks parentless tree nodes as managed and orphaned nodes as not', () => {
      const tree = ApplicationTreeSchema.parse({
        nodes: [
          { kind: 'Deployment', name: 'web' },
          { kind: 'ReplicaSet', name: 'web-5d9', parentRefs: [DEPLOYMENT_REF] },
        ],
        orphanedNodes: [{ kind: 'ConfigMap', name: 'leftover' }],
      });

      const nodes = toResourceNodes(tree);

      expect(nodes.map((n) => [n.name, n.managed])).toEqual([
        ['web', true],
        ['web-5d9', false],
        ['leftover', false],
      ]);
      expect(nodes.filter(isOrphan).map((n) => n.name)).toEqual(['leftover']);
    });

    it('accepts null lists', () => {
      const tree = ApplicationTreeSchema.parse({ nodes: null, orphanedNodes: null, hosts: null });

      expect(toResourceNodes(tree)).toEqual([]);
    });
  });

  // ==========================================================================
  // summarizeResourceTree
  // ==========================================================================

  describe('summarizeResourceTree', () => {
    it('counts parentless unmanaged nodes as orphans', () => {
      const nodes = [
        node({ kind: 'Deployment', name: 'web' }, true),
        node({ kind: 'ReplicaSet', name: 'web-5d9', parentRefs: [DEPLOYMENT_REF] }),
        node({ kind: 'Pod', name: 'web-5d9-a', parentRefs: [{ kind: 'ReplicaSet', name: 'web-5d9' }] }),
        node({ kind: 'ConfigMap', name: 'stale-a' }),
        node({ kind: 'Secret', name: 'stale-b' }),
      ];

      const summary = summarizeResourceTree(nodes);

      expect(summary.totalCount).toBe(5);
      expect(summary.orphanCount).toBe(2);
      expect(summary.parentedCount).toBe(3);
    });

    it('keys kind and health by exact strings, Unknown when absent', () => {
      const nodes = [
        node({ kind: 'Pod', name: 'a', health: { status: 'Healthy' } }),
        node({ kind: 'Pod', name: 'b', health: { status: 'Degraded' } }),
        node({ name: 'c' }),
      ];

      const summary = summarizeResourceTree(nodes);

      expect(summary.countsByKind).toEqual({ Pod: 2, Unknown: 1 });
      expect(summary.countsByHealth).toEqual({ Healthy: 1, Degraded: 1, Unknown: 1 });
    });

    it('samples the first 10 nodes by kind then name', () => {
      const nodes = [
        ...Array.from({ length: 12 }, (_, i) => node({ kind: 'Pod', name: `pod-${String(i).padStart(2, '0')}` })),
        node({ kind: 'Deployment', name: 'web', group: 'apps', version: 'v1', namespace: 'shop', images: ['web:1.2'] }, true),
      ];

      const summary = summarizeResourceTree(nodes, ['node-a']);

      expect(summary.sample).toHaveLength(10);
      expect(summary.sample[0]).toEqual({
        kind: 'Deployment',
        name: 'web',
        namespace: 'shop',
        group: 'apps',
        version: 'v1',
        health: 'Unknown',
        images: ['web:1.2'],
        parentCount: 0,
      });
      expect(summary.sample[1]?.name).toBe('pod-00');
      expect(summary.sample[9]?.name).toBe('pod-08');
      expect(summary.hosts).toEqual(['node-a']);
    });

    it('returns zero counts for an empty tree', () => {
      expect(summarizeResourceTree([])).toEqual({
        totalCount: 0,
        orphanCount: 0,
        parentedCount: 0,
        countsByKind: {},
        countsByHealth: {},
        sample: [],
        hosts: [],
      });
    });
  });
});
