/**
 * @module analyzer/diff-summarizer
 * @description Partitions server-side diff results into modified and in-sync resources
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-19
 */

import type { ResourceDiffRecord } from '../types/argocd.js';
import type { ServerSideDiffEntry, ServerSideDiffSummary } from '../types/summaries.js';
import { MESSAGES } from '../constants.js';

/**
 * Map one diff record to its summary entry. Live, target and predicted
 * state blobs are dropped.
 */
export function toDiffEntry(record: ResourceDiffRecord): ServerSideDiffEntry {
  const modified = record.modified ?? false;
  const entry: ServerSideDiffEntry = {
    resourceName: record.name ?? '',
    kind: record.kind ?? '',
    modified,
  };
  if (record.namespace) entry.namespace = record.namespace;
  if (record.group) entry.group = record.group;
  if (modified) entry.diffSummary = MESSAGES.DIFF_MODIFIED;
  return entry;
}

/**
 * Summarize diff records, keeping upstream order inside each partition
 */
export function summarizeServerSideDiff(records: readonly ResourceDiffRecord[]): ServerSideDiffSummary {
  const modifiedResources: ServerSideDiffEntry[] = [];
  const inSyncResources: ServerSideDiffEntry[] = [];

  for (const record of records) {
    const entry = toDiffEntry(record);
    (entry.modified ? modifiedResources : inSyncResources).push(entry);
  }

  return {
    totalCount: modifiedResources.length + inSyncResources.length,
    modifiedCount: modifiedResources.length,
    inSyncCount: inSyncResources.length,
    modifiedResources,
    inSyncResources,
  };
}
