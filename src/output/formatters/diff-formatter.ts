/**
 * @module output/formatters/diff-formatter
 * @description Text report for a server-side diff summary
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type { ServerSideDiffEntry, ServerSideDiffSummary } from '../../types/summaries.js';
import { resourceLabel } from './shared.js';

function entryLines(entries: readonly ServerSideDiffEntry[]): string[] {
  if (entries.length === 0) return ['  (none)'];
  return entries.map((entry) => {
    const label = `  - ${resourceLabel(entry.kind, entry.resourceName, entry.namespace)}`;
    return entry.diffSummary ? `${label}: ${entry.diffSummary}` : label;
  });
}

export function renderServerSideDiffReport(applicationName: string, summary: ServerSideDiffSummary): string {
  return [
    `Server-side diff for application '${applicationName}'`,
    `Total resources: ${summary.totalCount}, Modified: ${summary.modifiedCount}, In sync: ${summary.inSyncCount}`,
    '',
    'Modified Resources:',
    ...entryLines(summary.modifiedResources),
    '',
    'In Sync Resources:',
    ...entryLines(summary.inSyncResources),
  ].join('\n');
}
