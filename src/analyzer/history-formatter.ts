/**
 * @module analyzer/history-formatter
 * @description Orders deployment history newest first and marks current and automated entries
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-19
 */

import type { ApplicationSource, RevisionHistory } from '../types/argocd.js';
import type { HistoryEntrySummary, HistorySummary } from '../types/summaries.js';
import { DISPLAY_LIMITS } from '../constants.js';

const UNKNOWN_VALUE = 'unknown';

// ============================================================================
// Field Helpers
// ============================================================================

/**
 * First eight characters of a revision. Shorter strings come back unchanged.
 */
export function shortRevision(revision: string): string {
  return revision.slice(0, DISPLAY_LIMITS.SHORT_REVISION_CHARS);
}

/**
 * Seconds between start and end, when both parse and end is not earlier
 */
export function deployDurationSeconds(start: string | null | undefined, end: string | null | undefined): number | undefined {
  if (!start || !end) return undefined;
  const from = Date.parse(start);
  const to = Date.parse(end);
  if (Number.isNaN(from) || Number.isNaN(to) || to < from) return undefined;
  return Math.round((to - from) / 1000);
}

function primarySource(entry: RevisionHistory): ApplicationSource | undefined {
  return entry.source ?? entry.sources[0];
}

// ============================================================================
// Formatting
// ============================================================================

function toHistoryEntry(entry: RevisionHistory, currentId: number | undefined): HistoryEntrySummary {
  const id = entry.id ?? 0;
  const revisionFull = entry.revision || entry.revisions[0] || UNKNOWN_VALUE;
  const username = entry.initiatedBy?.username;
  const source = primarySource(entry);

  const summary: HistoryEntrySummary = {
    id,
    revision: shortRevision(revisionFull),
    revisionFull,
    deployedAt: entry.deployedAt || UNKNOWN_VALUE,
    automated: !username,
    current: id === currentId,
  };
  if (entry.deployStartedAt) summary.deployStartedAt = entry.deployStartedAt;
  const duration = deployDurationSeconds(entry.deployStartedAt, entry.deployedAt);
  if (duration !== undefined) summary.deployDurationSeconds = duration;
  if (source?.repoURL) summary.sourceRepo = source.repoURL;
  const path = source?.path || source?.chart;
  if (path) summary.sourcePath = path;
  if (source?.targetRevision) summary.sourceTargetRevision = source.targetRevision;
  if (username) summary.initiatedBy = username;
  return summary;
}

/**
 * Format deployment history.
 *
 * Entries are ordered by id descending; the highest id is the current
 * deployment. An entry counts as automated when no user initiated it.
 */
export function formatHistory(applicationName: string, entries: readonly RevisionHistory[]): HistorySummary {
  if (entries.length === 0) {
    return { applicationName, totalEntries: 0, isEmpty: true, entries: [] };
  }

  const sorted = [...entries].sort((a, b) => (b.id ?? 0) - (a.id ?? 0));
  const currentId = sorted[0]?.id ?? 0;

  return {
    applicationName,
    totalEntries: entries.length,
    isEmpty: false,
    currentId,
    entries: sorted
      .slice(0, DISPLAY_LIMITS.HISTORY_ENTRIES)
      .map((entry) => toHistoryEntry(entry, currentId)),
  };
}
