/**
 * @module output/formatters/log-formatter
 * @description Text report for a pod logs summary
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type { LogLevel, PodLogsSummary } from '../../types/summaries.js';
import { countLines } from './shared.js';

const LEVEL_INDICATORS: Record<LogLevel, string> = {
  FATAL: '💀',
  ERROR: '❌',
  WARNING: '⚠️',
  INFO: 'ℹ️',
  DEBUG: '🐛',
  UNKNOWN: '·',
};

export function noLogsMessage(applicationName: string, summary: PodLogsSummary): string {
  let message = `No logs found for application '${applicationName}'`;
  if (summary.podName) message += ` pod '${summary.podName}'`;
  if (summary.container) message += ` container '${summary.container}'`;
  return message;
}

export function renderPodLogsReport(applicationName: string, summary: PodLogsSummary): string {
  const lines: string[] = [`Pod Logs for application '${applicationName}'`];
  if (summary.podName) lines.push(`Pod: ${summary.podName}`);
  if (summary.container) lines.push(`Container: ${summary.container}`);
  lines.push(`Tail Lines: ${summary.tailLines}`);
  lines.push('');
  lines.push(`Total lines: ${summary.totalLines}`);
  if (summary.filtered) {
    lines.push('🔍 Filtered to show errors and potential issues only');
  }

  if (summary.errorCount > 0 || summary.warningCount > 0 || summary.potentialIssueCount > 0) {
    lines.push('', '📊 Log Analysis:');
    lines.push(`  Errors: ${summary.errorCount}`);
    lines.push(`  Warnings: ${summary.warningCount}`);
    lines.push(`  Potential Issues: ${summary.potentialIssueCount}`);
  }

  const nonZeroLevels = Object.fromEntries(
    Object.entries(summary.logsByLevel).filter(([, count]) => count > 0)
  );
  if (Object.keys(nonZeroLevels).length > 0) {
    lines.push('', 'Logs by Level:', ...countLines(nonZeroLevels));
  }

  lines.push('', `📝 Log Entries (showing ${summary.logEntries.length} of ${summary.matchingCount}):`);
  if (summary.logEntries.length === 0) {
    lines.push(summary.filtered ? '  (no errors or warnings detected)' : '  (none)');
  }
  for (const entry of summary.logEntries) {
    const timestamp = entry.timestamp ? `[${entry.timestamp}] ` : '';
    lines.push(`${LEVEL_INDICATORS[entry.level]} ${timestamp}${entry.level}: ${entry.content}`);
  }

  if (!summary.filtered && summary.potentialIssueCount > 0) {
    lines.push(
      '',
      `💡 Tip: use errorsOnly to list only the ${summary.potentialIssueCount} potential issues`
    );
  }
  if (summary.totalLines >= summary.tailLines) {
    lines.push('', '💡 Tip: the window is full; raise tailLines or use sinceSeconds to see more');
  }

  return lines.join('\n');
}
