/**
 * @module analyzer/resource-tree
 * @description Orphan, kind and health aggregates plus a stable sample over an application's resource tree
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-19
 */

import type { ApplicationTree } from '../types/argocd.js';
import type { ResourceNode, ResourceSample, ResourceTreeSummary } from '../types/summaries.js';
import { DISPLAY_LIMITS, MESSAGES } from '../constants.js';

// ============================================================================
// Normalization
// ============================================================================

/**
 * Flatten a tree payload into nodes carrying an ownership marker.
 *
 * Parentless entries of `nodes` are the application's own top-level
 * resources. Entries of `orphanedNodes` live in the destination namespace
 * but belong to nothing the application tracks.
 */
export function toResourceNodes(tree: ApplicationTree): ResourceNode[] {
  return [
    ...tree.nodes.map((node) => ({ ...node, managed: node.parentRefs.length === 0 })),
    ...tree.orphanedNodes.map((node) => ({ ...node, managed: false })),
  ];
}

// ============================================================================
// Summary
// ============================================================================

export function isOrphan(node: ResourceNode): boolean {
  return node.parentRefs.length === 0 && !node.managed;
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toSample(node: ResourceNode): ResourceSample {
  const sample: ResourceSample = {
    kind: node.kind || MESSAGES.UNKNOWN,
    name: node.name ?? '',
    health: node.health?.status || MESSAGES.UNKNOWN,
    images: [...node.images],
    parentCount: node.parentRefs.length,
  };
  if (node.namespace) sample.namespace = node.namespace;
  if (node.group) sample.group = node.group;
  if (node.version) sample.version = node.version;
  return sample;
}

/**
 * Summarize a resource hierarchy.
 *
 * Kind and health maps are keyed by the exact upstream strings (absent
 * values count as "Unknown") and always sum to `totalCount`. The sample is
 * the first {@link DISPLAY_LIMITS.TREE_SAMPLE} nodes by (kind, name).
 */
export function summarizeResourceTree(nodes: readonly ResourceNode[], hosts: readonly string[] = []): ResourceTreeSummary {
  const countsByKind: Record<string, number> = {};
  const countsByHealth: Record<string, number> = {};
  let orphanCount = 0;

  for (const node of nodes) {
    const kind = node.kind || MESSAGES.UNKNOWN;
    const health = node.health?.status || MESSAGES.UNKNOWN;
    countsByKind[kind] = (countsByKind[kind] ?? 0) + 1;
    countsByHealth[health] = (countsByHealth[health] ?? 0) + 1;
    if (isOrphan(node)) orphanCount++;
  }

  const sample = [...nodes]
    .sort((a, b) => compareOrdinal(a.kind ?? '', b.kind ?? '') || compareOrdinal(a.name ?? '', b.name ?? ''))
    .slice(0, DISPLAY_LIMITS.TREE_SAMPLE)
    .map(toSample);

  return {
    totalCount: nodes.length,
    orphanCount,
    parentedCount: nodes.length - orphanCount,
    countsByKind,
    countsByHealth,
    sample,
    hosts: [...hosts],
  };
}
