/**
 * @module analyzer/history-formatter.test
 * @description Unit tests for deployment history formatting
 * @status COMPLETE
 * @dependencies src/analyzer/history-formatter.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { deployDurationSeconds, formatHistory, shortRevision } from './history-formatter.js';
import { RevisionHistorySchema, type RevisionHistory } from '../types/argocd.js';

function entry(raw: Record<string, unknown>): RevisionHistory {
  return RevisionHistorySchema.parse(raw);
}

describe('history-formatter', () => {
  // ==========================================================================
  // Helpers
  // ==========================================================================

  describe('shortRevision', () => {
    it('keeps the first eight characters', () => {
      expect(shortRevision('0123456789abcdef')).toBe('01234567');
    });

    it('returns short revisions unchanged', () => {
      expect(shortRevision('v1.2')).toBe('v1.2');
      expect(shortRevision(shortRevision('v1.2'))).toBe('v1.2');
    });
  });

  describe('deployDurationSeconds', () => {
    it('computes whole seconds between start and end', () => {
      expect(deployDurationSeconds('2026-01-01T00:00:00Z', '2026-01-01T00:01:30Z')).toBe(90);
    });

    it('is undefined when either side is missing or unparseable', () => {
      expect(deployDurationSeconds(undefined, '2026-01-01T00:01:30Z')).toBeUndefined();
      expect(deployDurationSeconds('2026-01-01T00:00:00Z', 'soon')).toBeUndefined();
      expect(deployDurationSeconds('2026-01-01T00:01:00Z', '2026-01-01T00:00:00Z')).toBeUndefined();
    });
  });

  // ==========================================================================
  // formatHistory
  // ==========================================================================

  describe('formatHistory', () => {
    it('orders by id descending and marks the highest id current', () => {
      const entries = [3, 1, 5, 2, 4].map((id) => entry({ id, revision: `rev${id}` }));

      const summary = formatHistory('checkout', entries);

      expect(summary.currentId).toBe(5);
      expect(summary.entries.map((e) => e.id)).toEqual([5, 4, 3, 2, 1]);
      expect(summary.entries.map((e) => e.current)).toEqual([true, false, false, false, false]);
      expect(summary.totalEntries).toBe(5);
      expect(summary.isEmpty).toBe(false);
    });

    it('builds each entry from its source and initiator', () => {
      const summary = formatHistory('checkout', [
        entry({
          id: '7',
          revision: '9f3c2a1b7e6d5c4b',
          deployStartedAt: '2026-01-01T00:00:00Z',
          deployedAt: '2026-01-01T00:00:42Z',
          source: { repoURL: 'https://git.example.com/shop.git', path: 'deploy/prod', targetRevision: 'main' },
          initiatedBy: { username: 'alice' },
        }),
      ]);

      expect(summary.entries[0]).toEqual({
        id: 7,
        revision: '9f3c2a1b',
        revisionFull: '9f3c2a1b7e6d5c4b',
        deployedAt: '2026-01-01T00:00:42Z',
        deployStartedAt: '2026-01-01T00:00:00Z',
        deployDurationSeconds: 42,
        sourceRepo: 'https://git.example.com/shop.git',
        sourcePath: 'deploy/prod',
        sourceTargetRevision: 'main',
        initiatedBy: 'alice',
        automated: false,
        current: true,
      });
    });

    it('uses the first revision and source of multi-source entries', () => {
      const summary = formatHistory('checkout', [
        entry({
          id: 1,
          revisions: ['abc123', 'def456'],
          sources: [{ repoURL: 'https://charts.example.com', chart: 'web' }, { repoURL: 'https://git.example.com/values.git' }],
          initiatedBy: { automated: true },
        }),
      ]);

      const first = summary.entries[0];
      expect(first?.revision).toBe('abc123');
      expect(first?.sourceRepo).toBe('https://charts.example.com');
      expect(first?.sourcePath).toBe('web');
      expect(first?.automated).toBe(true);
      expect(first?.deployedAt).toBe('unknown');
    });

    it('caps the list at 20 entries', () => {
      const entries = Array.from({ length: 25 }, (_, i) => entry({ id: i + 1, revision: 'r' }));

      const summary = formatHistory('checkout', entries);

      expect(summary.totalEntries).toBe(25);
      expect(summary.entries).toHaveLength(20);
      expect(summary.entries[0]?.id).toBe(25);
      expect(summary.entries[19]?.id).toBe(6);
    });

    it('reports an empty history', () => {
      expect(formatHistory('checkout', [])).toEqual({
        applicationName: 'checkout',
        totalEntries: 0,
        isEmpty: true,
        entries: [],
      });
    });
  });
});
