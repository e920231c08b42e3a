/**
 * @module analyzer/event-aggregator
 * @description Groups Kubernetes events by type and reason and lists the most recent ones
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-19
 */

import type { KubeEvent } from '../types/argocd.js';
import type { EventDetail, EventsSummary } from '../types/summaries.js';
import { DISPLAY_LIMITS, MESSAGES } from '../constants.js';

// ============================================================================
// Ordering
// ============================================================================

/**
 * Most recent timestamp an event carries, as epoch milliseconds.
 * `lastTimestamp` is preferred; newer event sources only fill `eventTime`.
 */
export function eventRecency(event: KubeEvent): number | undefined {
  const candidates = [
    event.lastTimestamp,
    event.eventTime,
    event.firstTimestamp,
    event.metadata?.creationTimestamp,
  ];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const ms = Date.parse(candidate);
    if (!Number.isNaN(ms)) return ms;
  }
  return undefined;
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Recency descending, undated events last, then count descending, then reason
 */
export function compareEvents(a: KubeEvent, b: KubeEvent): number {
  const ta = eventRecency(a);
  const tb = eventRecency(b);
  if (ta !== tb) {
    if (ta === undefined) return 1;
    if (tb === undefined) return -1;
    return tb - ta;
  }
  const countDiff = (b.count ?? 1) - (a.count ?? 1);
  if (countDiff !== 0) return countDiff;
  return compareOrdinal(a.reason ?? '', b.reason ?? '');
}

// ============================================================================
// Aggregation
// ============================================================================

function toDetail(event: KubeEvent): EventDetail {
  const detail: EventDetail = {
    type: event.type || MESSAGES.UNKNOWN,
    reason: event.reason || MESSAGES.UNKNOWN,
    count: event.count ?? 1,
    involvedObject: {
      kind: event.involvedObject?.kind,
      name: event.involvedObject?.name,
      namespace: event.involvedObject?.namespace,
    },
  };
  if (event.metadata?.name) detail.name = event.metadata.name;
  if (event.message) detail.message = event.message;
  if (event.firstTimestamp) detail.firstTimestamp = event.firstTimestamp;
  const last = event.lastTimestamp || event.eventTime;
  if (last) detail.lastTimestamp = last;
  if (event.source?.component) detail.sourceComponent = event.source.component;
  return detail;
}

function increment(map: Record<string, number>, key: string): void {
  map[key] = (map[key] ?? 0) + 1;
}

/**
 * Aggregate an event list. Both count maps cover every input event; the
 * detail list holds at most {@link DISPLAY_LIMITS.EVENTS} entries.
 */
export function aggregateEvents(events: readonly KubeEvent[]): EventsSummary {
  const countsByType: Record<string, number> = {};
  const countsByReason: Record<string, number> = {};

  for (const event of events) {
    increment(countsByType, event.type || MESSAGES.UNKNOWN);
    increment(countsByReason, event.reason || MESSAGES.UNKNOWN);
  }

  const details = [...events]
    .sort(compareEvents)
    .slice(0, DISPLAY_LIMITS.EVENTS)
    .map(toDetail);

  return {
    totalCount: events.length,
    countsByType,
    countsByReason,
    events: details,
  };
}
