/**
 * @module analyzer/application
 * @description Summaries for application objects, manifests, revisions, sync windows and single resources
 * @status COMPLETE
 * @dependencies yaml, src/types
 * @lastModified 2026-10-19
 */

import { parse as parseYaml } from 'yaml';

import type {
  Application,
  ManifestResponse,
  RevisionMetadata,
  SyncWindow,
  SyncWindowsResponse,
} from '../types/argocd.js';
import type {
  ApplicationDetail,
  ApplicationSummary,
  ManifestSummary,
  OperationSummary,
  ParsedManifest,
  RefreshSummary,
  ResourceManifestSummary,
  ResourceSummary,
  RevisionMetadataSummary,
  RollbackSummary,
  SyncSummary,
  SyncWindowSummary,
  SyncWindowsSummary,
} from '../types/summaries.js';
import { DISPLAY_LIMITS, MESSAGES } from '../constants.js';

// ============================================================================
// Loose Object Access
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(record: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' ? value : undefined;
}

function recordAt(record: Record<string, unknown> | undefined, key: string): Record<string, unknown> | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

/**
 * Parse a manifest that may be YAML or JSON. JSON is valid YAML, so one
 * parser covers both. Returns undefined for anything that is not a mapping.
 */
export function parseManifestDocument(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = parseYaml(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

// ============================================================================
// Applications
// ============================================================================

export function summarizeApplication(app: Application): ApplicationSummary {
  const source = app.spec?.source ?? app.spec?.sources[0];
  return {
    name: app.metadata?.name ?? '',
    namespace: app.metadata?.namespace,
    project: app.spec?.project,
    repoUrl: source?.repoURL,
    targetRevision: source?.targetRevision,
    destinationServer: app.spec?.destination?.server,
    destinationNamespace: app.spec?.destination?.namespace,
    syncStatus: app.status?.sync?.status,
    healthStatus: app.status?.health?.status,
    autoSync: Boolean(app.spec?.syncPolicy?.automated),
  };
}

/**
 * Application names, sorted
 */
export function applicationNames(apps: readonly Application[]): string[] {
  return apps
    .map((app) => app.metadata?.name)
    .filter((name): name is string => typeof name === 'string' && name.length > 0)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function summarizeApplicationDetail(app: Application): ApplicationDetail {
  const source = app.spec?.source ?? app.spec?.sources[0];
  const automated = app.spec?.syncPolicy?.automated;
  return {
    ...summarizeApplication(app),
    path: source?.path,
    chart: source?.chart,
    destinationName: app.spec?.destination?.name,
    sourceCount: app.spec?.source ? 1 : app.spec?.sources.length ?? 0,
    syncRevision: app.status?.sync?.revision ?? app.status?.sync?.revisions[0],
    healthMessage: app.status?.health?.message,
    autoSyncPrune: automated?.prune ?? false,
    autoSyncSelfHeal: automated?.selfHeal ?? false,
    syncOptions: app.spec?.syncPolicy?.syncOptions ?? [],
    operationPhase: app.status?.operationState?.phase,
    labels: { ...(app.metadata?.labels ?? {}) },
    creationTimestamp: app.metadata?.creationTimestamp ?? undefined,
    reconciledAt: app.status?.reconciledAt ?? undefined,
    historyCount: app.status?.history.length ?? 0,
  };
}

// ============================================================================
// Manifests
// ============================================================================

export function parseManifest(text: string): ParsedManifest {
  const doc = parseManifestDocument(text);
  const metadata = recordAt(doc, 'metadata');
  const parsed: ParsedManifest = {
    kind: stringAt(doc, 'kind') ?? MESSAGES.UNKNOWN,
    apiVersion: stringAt(doc, 'apiVersion') ?? MESSAGES.UNKNOWN,
    name: stringAt(metadata, 'name') ?? MESSAGES.UNKNOWN,
  };
  const namespace = stringAt(metadata, 'namespace');
  if (namespace) parsed.namespace = namespace;
  return parsed;
}

export function summarizeManifests(response: ManifestResponse): ManifestSummary {
  const manifests = response.manifests.map(parseManifest);
  const manifestsByKind: Record<string, number> = {};
  for (const manifest of manifests) {
    manifestsByKind[manifest.kind] = (manifestsByKind[manifest.kind] ?? 0) + 1;
  }
  return {
    totalManifests: manifests.length,
    manifestsByKind,
    revision: response.revision,
    namespace: response.namespace,
    server: response.server,
    sourceType: response.sourceType,
    manifests,
  };
}

// ============================================================================
// Revision Metadata
// ============================================================================

/**
 * Classify GPG verification output. Negative markers are checked first
 * since "INVALID" also contains "VALID".
 */
export function signatureStatus(signatureInfo: string | undefined): string | undefined {
  if (!signatureInfo) return undefined;
  const upper = signatureInfo.toUpperCase();
  if (signatureInfo.includes('Bad signature') || upper.includes('INVALID')) return 'Invalid signature';
  if (signatureInfo.includes('Good signature') || upper.includes('VALID')) return 'Valid signature';
  return 'Signature present';
}

export function summarizeRevisionMetadata(revision: string, metadata: RevisionMetadata): RevisionMetadataSummary {
  const summary: RevisionMetadataSummary = {
    revision,
    tags: metadata.tags,
    tagCount: metadata.tags.length,
    isSigned: Boolean(metadata.signatureInfo),
  };
  if (metadata.author) summary.author = metadata.author;
  if (metadata.date) summary.date = metadata.date;
  if (metadata.message !== undefined) {
    summary.message = metadata.message;
    summary.messageShort = metadata.message.split('\n')[0]?.trim() ?? '';
  }
  const status = signatureStatus(metadata.signatureInfo);
  if (status) summary.signatureStatus = status;
  return summary;
}

// ============================================================================
// Sync Windows
// ============================================================================

function toWindowSummary(window: SyncWindow): SyncWindowSummary {
  const summary: SyncWindowSummary = {
    kind: window.kind ?? MESSAGES.UNKNOWN,
    schedule: window.schedule ?? '',
    duration: window.duration ?? '',
    manualSync: window.manualSync ?? false,
    applications: window.applications,
    namespaces: window.namespaces,
    clusters: window.clusters,
  };
  if (window.timeZone) summary.timeZone = window.timeZone;
  return summary;
}

export function summarizeSyncWindows(applicationName: string, response: SyncWindowsResponse): SyncWindowsSummary {
  return {
    applicationName,
    canSync: response.canSync ?? true,
    activeWindows: response.activeWindows.map(toWindowSummary),
    assignedWindows: response.assignedWindows.map(toWindowSummary),
  };
}

// ============================================================================
// Single Resources
// ============================================================================

/**
 * Short status line from a manifest's `status` block: phase, then the Ready
 * condition, then replica counts
 */
export function resourceStatusLine(status: Record<string, unknown> | undefined): string | undefined {
  if (!status) return undefined;

  const phase = stringAt(status, 'phase');
  if (phase) return `Phase: ${phase}`;

  const conditions = status['conditions'];
  if (Array.isArray(conditions)) {
    const ready = conditions.find((c): c is Record<string, unknown> => isRecord(c) && c['type'] === 'Ready');
    const readyStatus = stringAt(ready, 'status');
    return readyStatus ? `Ready: ${readyStatus}` : undefined;
  }

  const replicas = status['replicas'];
  if (typeof replicas === 'number') {
    const readyReplicas = status['readyReplicas'];
    return `${typeof readyReplicas === 'number' ? readyReplicas : 0}/${replicas} replicas ready`;
  }

  return 'Status available';
}

export function summarizeResourceManifest(manifest: string): ResourceManifestSummary {
  const doc = parseManifestDocument(manifest);
  const metadata = recordAt(doc, 'metadata');
  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(recordAt(metadata, 'labels') ?? {})) {
    if (typeof value === 'string') labels[key] = value;
  }
  return {
    apiVersion: stringAt(doc, 'apiVersion'),
    kind: stringAt(doc, 'kind'),
    name: stringAt(metadata, 'name'),
    namespace: stringAt(metadata, 'namespace'),
    labels,
    annotationsCount: Object.keys(recordAt(metadata, 'annotations') ?? {}).length,
    creationTimestamp: stringAt(metadata, 'creationTimestamp'),
    statusSummary: resourceStatusLine(recordAt(doc, 'status')),
  };
}

export function truncateManifest(manifest: string): string {
  if (manifest.length <= DISPLAY_LIMITS.MANIFEST_CHARS) return manifest;
  return `${manifest.slice(0, DISPLAY_LIMITS.MANIFEST_CHARS)}... (truncated, ${manifest.length} total chars)`;
}

export interface ResourceIdentity {
  applicationName: string;
  kind: string;
  resourceName: string;
  namespace?: string;
  version: string;
  group?: string;
}

export function summarizeResource(identity: ResourceIdentity, manifest: string): ResourceSummary {
  return {
    ...identity,
    manifestSummary: summarizeResourceManifest(manifest),
    manifest: truncateManifest(manifest),
  };
}

// ============================================================================
// Operations
// ============================================================================

function operationSummary(app: Application, name: string, dryRun: boolean, prune: boolean): OperationSummary {
  const source = app.spec?.source ?? app.spec?.sources[0];
  return {
    name: app.metadata?.name || name,
    dryRun,
    pruneEnabled: prune,
    syncStatus: app.status?.sync?.status,
    healthStatus: app.status?.health?.status,
    syncRevision: app.status?.sync?.revision,
    targetRevision: source?.targetRevision,
    operationPhase: app.status?.operationState?.phase,
  };
}

export interface SyncOptionsEcho {
  dryRun: boolean;
  prune: boolean;
  force: boolean;
  syncOptions: string[];
  resourcesCount?: number;
}

export function summarizeSync(name: string, app: Application, request: SyncOptionsEcho): SyncSummary {
  const summary: SyncSummary = {
    ...operationSummary(app, name, request.dryRun, request.prune),
    forceEnabled: request.force,
    syncOptions: request.syncOptions,
  };
  if (request.resourcesCount !== undefined) summary.resourcesCount = request.resourcesCount;
  return summary;
}

export function summarizeRollback(
  name: string,
  app: Application,
  request: { id: number; dryRun: boolean; prune: boolean }
): RollbackSummary {
  return {
    ...operationSummary(app, name, request.dryRun, request.prune),
    rolledBackToId: request.id,
  };
}

/**
 * Compare application state before and after a refresh
 */
export function compareRefresh(
  name: string,
  refreshType: 'normal' | 'hard',
  before: Application,
  after: Application
): RefreshSummary {
  const source = after.spec?.source ?? after.spec?.sources[0];
  const syncBefore = before.status?.sync?.status;
  const syncAfter = after.status?.sync?.status;
  const healthBefore = before.status?.health?.status;
  const healthAfter = after.status?.health?.status;
  const revisionBefore = before.status?.sync?.revision;
  const revisionAfter = after.status?.sync?.revision;
  return {
    name,
    refreshType,
    syncStatusBefore: syncBefore,
    syncStatusAfter: syncAfter,
    healthStatusBefore: healthBefore,
    healthStatusAfter: healthAfter,
    revisionBefore,
    revisionAfter,
    syncStatusChanged: syncBefore !== syncAfter,
    healthStatusChanged: healthBefore !== healthAfter,
    revisionChanged: revisionBefore !== revisionAfter,
    repoUrl: source?.repoURL,
    targetRevision: source?.targetRevision,
  };
}
