/**
 * @module output/formatters/tree-formatter
 * @description Text report for a resource tree summary
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type { ResourceTreeSummary } from '../../types/summaries.js';
import { countLines, resourceLabel } from './shared.js';

export function renderResourceTreeReport(applicationName: string, summary: ResourceTreeSummary): string {
  if (summary.totalCount === 0) {
    return `No resources found for application '${applicationName}'`;
  }

  const lines: string[] = [
    `Resource tree for application '${applicationName}'`,
    `Total resources: ${summary.totalCount} (orphaned: ${summary.orphanCount}, parented or managed: ${summary.parentedCount})`,
    '',
    'Resources by Kind:',
    ...countLines(summary.countsByKind),
    '',
    'Health Status:',
    ...countLines(summary.countsByHealth),
    '',
    `Sample Resources (showing ${summary.sample.length} of ${summary.totalCount}):`,
  ];

  for (const node of summary.sample) {
    let line = `  - ${resourceLabel(node.kind, node.name, node.namespace)} health: ${node.health}`;
    if (node.parentCount > 0) line += `, parents: ${node.parentCount}`;
    if (node.images.length > 0) line += `, images: ${node.images.join(', ')}`;
    lines.push(line);
  }

  if (summary.hosts.length > 0) {
    lines.push('', `Hosts: ${summary.hosts.join(', ')}`);
  }

  return lines.join('\n');
}
