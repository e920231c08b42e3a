/**
 * @module output/formatters/history-formatter
 * @description Text report for deployment history
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type { HistorySummary } from '../../types/summaries.js';

export function renderHistoryReport(summary: HistorySummary): string {
  if (summary.isEmpty) {
    return `No deployment history found for application '${summary.applicationName}'`;
  }

  const lines: string[] = [
    `Deployment history for application '${summary.applicationName}'`,
    `Total entries: ${summary.totalEntries} (showing ${summary.entries.length})`,
    '',
  ];

  for (const entry of summary.entries) {
    const marker = entry.current ? ' (current)' : '';
    lines.push(`#${entry.id} ${entry.revision} deployed ${entry.deployedAt}${marker}`);

    const source = [entry.sourceRepo, entry.sourcePath].filter(Boolean).join(' ');
    if (source) {
      const target = entry.sourceTargetRevision ? ` @ ${entry.sourceTargetRevision}` : '';
      lines.push(`    source: ${source}${target}`);
    }
    if (entry.deployDurationSeconds !== undefined) {
      lines.push(`    duration: ${entry.deployDurationSeconds}s`);
    }
    lines.push(`    initiated by: ${entry.automated ? 'automated' : entry.initiatedBy}`);
  }

  return lines.join('\n');
}
