/**
 * @module types/summaries
 * @description Bounded, context-friendly summaries produced by the analyzers
 * @status COMPLETE
 * @dependencies src/types/argocd.ts
 * @lastModified 2026-10-19
 */

import type { ResourceTreeNode } from './argocd.js';

// ============================================================================
// Logs
// ============================================================================

export type LogLevel = 'FATAL' | 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG' | 'UNKNOWN';

/**
 * One line of container output as delivered by the log stream
 */
export interface RawLogLine {
  content: string;
  timestamp?: string;
  podName?: string;
  container?: string;
}

export interface AnalyzedLogEntry {
  content: string;
  timestamp?: string;
  podName?: string;
  level: LogLevel;
  /** ERROR or FATAL */
  isError: boolean;
  isWarning: boolean;
  /** Flagged by level or by issue keyword */
  potentialIssue: boolean;
}

export interface PodLogsSummary {
  /** Size of the retained window, before any errors-only filtering */
  totalLines: number;
  errorCount: number;
  warningCount: number;
  potentialIssueCount: number;
  logsByLevel: Record<LogLevel, number>;
  /** Entries that passed the display filter, before the display cap */
  matchingCount: number;
  filtered: boolean;
  tailLines: number;
  podName?: string;
  container?: string;
  logEntries: AnalyzedLogEntry[];
}

// ============================================================================
// Events
// ============================================================================

export interface EventDetail {
  name?: string;
  type: string;
  reason: string;
  message?: string;
  count: number;
  firstTimestamp?: string;
  lastTimestamp?: string;
  involvedObject: {
    kind?: string;
    name?: string;
    namespace?: string;
  };
  sourceComponent?: string;
}

export interface EventsSummary {
  totalCount: number;
  countsByType: Record<string, number>;
  countsByReason: Record<string, number>;
  /** Most recent first */
  events: EventDetail[];
}

// ============================================================================
// Resource Tree
// ============================================================================

/**
 * Tree node with its application-level ownership marker. `managed` is true
 * for top-level resources the application itself owns.
 */
export interface ResourceNode extends ResourceTreeNode {
  managed: boolean;
}

export interface ResourceSample {
  kind: string;
  name: string;
  namespace?: string;
  group?: string;
  version?: string;
  health: string;
  images: string[];
  parentCount: number;
}

export interface ResourceTreeSummary {
  totalCount: number;
  orphanCount: number;
  parentedCount: number;
  countsByKind: Record<string, number>;
  countsByHealth: Record<string, number>;
  sample: ResourceSample[];
  hosts: string[];
}

// ============================================================================
// Server-Side Diff
// ============================================================================

export interface ServerSideDiffEntry {
  resourceName: string;
  kind: string;
  namespace?: string;
  group?: string;
  modified: boolean;
  diffSummary?: string;
}

export interface ServerSideDiffSummary {
  totalCount: number;
  modifiedCount: number;
  inSyncCount: number;
  modifiedResources: ServerSideDiffEntry[];
  inSyncResources: ServerSideDiffEntry[];
}

// ============================================================================
// History
// ============================================================================

export interface HistoryEntrySummary {
  id: number;
  /** First 8 characters of the revision */
  revision: string;
  revisionFull: string;
  deployedAt: string;
  deployStartedAt?: string;
  deployDurationSeconds?: number;
  sourceRepo?: string;
  sourcePath?: string;
  sourceTargetRevision?: string;
  initiatedBy?: string;
  automated: boolean;
  current: boolean;
}

export interface HistorySummary {
  applicationName: string;
  totalEntries: number;
  isEmpty: boolean;
  currentId?: number;
  entries: HistoryEntrySummary[];
}

// ============================================================================
// Applications
// ============================================================================

export interface ApplicationSummary {
  name: string;
  namespace?: string;
  project?: string;
  repoUrl?: string;
  targetRevision?: string;
  destinationServer?: string;
  destinationNamespace?: string;
  syncStatus?: string;
  healthStatus?: string;
  autoSync: boolean;
}

export interface ApplicationDetail extends ApplicationSummary {
  path?: string;
  chart?: string;
  destinationName?: string;
  sourceCount: number;
  syncRevision?: string;
  healthMessage?: string;
  autoSyncPrune: boolean;
  autoSyncSelfHeal: boolean;
  syncOptions: string[];
  operationPhase?: string;
  labels: Record<string, string>;
  creationTimestamp?: string;
  reconciledAt?: string;
  historyCount: number;
}

export interface ParsedManifest {
  kind: string;
  apiVersion: string;
  name: string;
  namespace?: string;
}

export interface ManifestSummary {
  totalManifests: number;
  manifestsByKind: Record<string, number>;
  revision?: string;
  namespace?: string;
  server?: string;
  sourceType?: string;
  manifests: ParsedManifest[];
}

export interface RevisionMetadataSummary {
  revision: string;
  author?: string;
  date?: string;
  message?: string;
  messageShort?: string;
  tags: string[];
  tagCount: number;
  isSigned: boolean;
  signatureStatus?: string;
}

export interface SyncWindowSummary {
  kind: string;
  schedule: string;
  duration: string;
  manualSync: boolean;
  timeZone?: string;
  applications: string[];
  namespaces: string[];
  clusters: string[];
}

export interface SyncWindowsSummary {
  applicationName: string;
  canSync: boolean;
  activeWindows: SyncWindowSummary[];
  assignedWindows: SyncWindowSummary[];
}

export interface ResourceManifestSummary {
  apiVersion?: string;
  kind?: string;
  name?: string;
  namespace?: string;
  labels: Record<string, string>;
  annotationsCount: number;
  creationTimestamp?: string;
  statusSummary?: string;
}

export interface ResourceSummary {
  applicationName: string;
  kind: string;
  resourceName: string;
  namespace?: string;
  version: string;
  group?: string;
  manifestSummary: ResourceManifestSummary;
  /** Manifest text, truncated for large resources */
  manifest: string;
}

export interface OperationSummary {
  name: string;
  dryRun: boolean;
  pruneEnabled: boolean;
  syncStatus?: string;
  healthStatus?: string;
  syncRevision?: string;
  targetRevision?: string;
  operationPhase?: string;
}

export interface SyncSummary extends OperationSummary {
  forceEnabled: boolean;
  syncOptions: string[];
  resourcesCount?: number;
}

export interface RollbackSummary extends OperationSummary {
  rolledBackToId: number;
}

export interface RefreshSummary {
  name: string;
  refreshType: 'normal' | 'hard';
  syncStatusBefore?: string;
  syncStatusAfter?: string;
  healthStatusBefore?: string;
  healthStatusAfter?: string;
  revisionBefore?: string;
  revisionAfter?: string;
  syncStatusChanged: boolean;
  healthStatusChanged: boolean;
  revisionChanged: boolean;
  repoUrl?: string;
  targetRevision?: string;
}
