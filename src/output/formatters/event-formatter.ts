/**
 * @module output/formatters/event-formatter
 * @description Text report for an events summary
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type { EventsSummary } from '../../types/summaries.js';
import { DISPLAY_LIMITS } from '../../constants.js';
import { countLines, resourceLabel, sortedCounts } from './shared.js';

export function renderEventsReport(applicationName: string, summary: EventsSummary): string {
  if (summary.totalCount === 0) {
    return `No events found for application '${applicationName}'`;
  }

  const lines: string[] = [
    `Events for application '${applicationName}'`,
    `Total events: ${summary.totalCount}`,
    '',
    'By Type:',
    ...countLines(summary.countsByType),
    '',
    'By Reason:',
  ];

  const reasons = sortedCounts(summary.countsByReason);
  for (const [reason, count] of reasons.slice(0, DISPLAY_LIMITS.EVENT_REASONS)) {
    lines.push(`  ${reason}: ${count}`);
  }
  if (reasons.length > DISPLAY_LIMITS.EVENT_REASONS) {
    lines.push(`  ... and ${reasons.length - DISPLAY_LIMITS.EVENT_REASONS} more`);
  }

  lines.push('', `Recent Events (showing ${summary.events.length} of ${summary.totalCount}):`);
  summary.events.forEach((event, i) => {
    const object = event.involvedObject;
    lines.push(`${i + 1}. [${event.type}] ${event.reason}: ${event.message ?? ''}`.trimEnd());
    lines.push(`   Object: ${resourceLabel(object.kind, object.name, object.namespace)}`);
    const meta = [`Count: ${event.count}`];
    if (event.lastTimestamp) meta.push(`Last: ${event.lastTimestamp}`);
    if (event.sourceComponent) meta.push(`Source: ${event.sourceComponent}`);
    lines.push(`   ${meta.join(' | ')}`);
  });

  return lines.join('\n');
}
