/**
 * @module analyzer/diff-summarizer.test
 * @description Unit tests for server-side diff summaries
 * @status COMPLETE
 * @dependencies src/analyzer/diff-summarizer.ts
 */

import { describe, it, expect } from 'vitest';
import { summarizeServerSideDiff, toDiffEntry } from './diff-summarizer.js';

describe('diff-summarizer', () => {
  it('partitions records into modified and in sync', () => {
    const summary = summarizeServerSideDiff([
      { kind: 'Deployment', name: 'web', namespace: 'shop', group: 'apps', modified: true, liveState: '{}', targetState: '{}' },
      { kind: 'Service', name: 'web', namespace: 'shop', modified: false },
      { kind: 'ConfigMap', name: 'settings', namespace: 'shop' },
    ]);

    expect(summary.totalCount).toBe(3);
    expect(summary.modifiedCount).toBe(1);
    expect(summary.inSyncCount).toBe(2);
    expect(summary.modifiedResources).toEqual([
      {
        resourceName: 'web',
        kind: 'Deployment',
        namespace: 'shop',
        group: 'apps',
        modified: true,
        diffSummary: 'Resource has differences between live and target state',
      },
    ]);
    expect(summary.inSyncResources.map((entry) => entry.kind)).toEqual(['Service', 'ConfigMap']);
  });

  it('omits the diff summary for resources in sync', () => {
    expect(toDiffEntry({ kind: 'Service', name: 'web' })).toEqual({
      resourceName: 'web',
      kind: 'Service',
      modified: false,
    });
  });

  it('returns zero counts for no records', () => {
    expect(summarizeServerSideDiff([])).toEqual({
      totalCount: 0,
      modifiedCount: 0,
      inSyncCount: 0,
      modifiedResources: [],
      inSyncResources: [],
    });
  });
});
