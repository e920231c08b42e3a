/**
 * @module output/formatters/application-formatter
 * @description Text reports for application, manifest, revision, sync window, resource and operation summaries
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 */

import type {
  ApplicationDetail,
  ApplicationSummary,
  ManifestSummary,
  RefreshSummary,
  ResourceSummary,
  RevisionMetadataSummary,
  RollbackSummary,
  SyncSummary,
  SyncWindowSummary,
  SyncWindowsSummary,
} from '../../types/summaries.js';
import { countLines, resourceLabel } from './shared.js';

const NONE = '-';

// ============================================================================
// Applications
// ============================================================================

export function renderApplicationList(apps: readonly ApplicationSummary[]): string {
  if (apps.length === 0) {
    return 'No applications found';
  }
  const lines = [`Found ${apps.length} application(s):`, ''];
  for (const app of apps) {
    lines.push(`- ${app.name} (project: ${app.project ?? NONE})`);
    lines.push(`    sync: ${app.syncStatus ?? NONE}, health: ${app.healthStatus ?? NONE}, auto-sync: ${app.autoSync ? 'on' : 'off'}`);
    lines.push(`    source: ${app.repoUrl ?? NONE} @ ${app.targetRevision ?? NONE}`);
    lines.push(`    destination: ${app.destinationServer ?? NONE} / ${app.destinationNamespace ?? NONE}`);
  }
  return lines.join('\n');
}

export function renderApplicationNames(names: readonly string[]): string {
  if (names.length === 0) {
    return 'No applications found';
  }
  return [`Found ${names.length} application(s):`, ...names.map((name) => `- ${name}`)].join('\n');
}

export function renderApplicationDetail(app: ApplicationDetail): string {
  const lines = [
    `Application '${app.name}'`,
    `Project: ${app.project ?? NONE}`,
    `Namespace: ${app.namespace ?? NONE}`,
    '',
    'Source:',
    `  Repository: ${app.repoUrl ?? NONE}`,
    `  Path: ${app.path ?? app.chart ?? NONE}`,
    `  Target revision: ${app.targetRevision ?? NONE}`,
  ];
  if (app.sourceCount > 1) lines.push(`  Sources: ${app.sourceCount} (first shown)`);
  lines.push(
    '',
    'Destination:',
    `  Server: ${app.destinationServer ?? app.destinationName ?? NONE}`,
    `  Namespace: ${app.destinationNamespace ?? NONE}`,
    '',
    'Status:',
    `  Sync: ${app.syncStatus ?? NONE}${app.syncRevision ? ` (${app.syncRevision})` : ''}`,
    `  Health: ${app.healthStatus ?? NONE}${app.healthMessage ? ` - ${app.healthMessage}` : ''}`
  );
  if (app.operationPhase) lines.push(`  Last operation: ${app.operationPhase}`);
  lines.push(
    '',
    'Sync Policy:',
    `  Automated: ${app.autoSync ? 'yes' : 'no'}${app.autoSync ? ` (prune: ${app.autoSyncPrune}, selfHeal: ${app.autoSyncSelfHeal})` : ''}`
  );
  if (app.syncOptions.length > 0) lines.push(`  Options: ${app.syncOptions.join(', ')}`);
  lines.push(`History entries: ${app.historyCount}`);
  return lines.join('\n');
}

// ============================================================================
// Manifests and Revisions
// ============================================================================

export function renderManifests(applicationName: string, summary: ManifestSummary): string {
  if (summary.totalManifests === 0) {
    return `No manifests found for application '${applicationName}'`;
  }
  const lines = [
    `Manifests for application '${applicationName}'`,
    `Total manifests: ${summary.totalManifests}`,
  ];
  if (summary.revision) lines.push(`Revision: ${summary.revision}`);
  if (summary.sourceType) lines.push(`Source type: ${summary.sourceType}`);
  lines.push('', 'By Kind:', ...countLines(summary.manifestsByKind), '', 'Manifests:');
  for (const manifest of summary.manifests) {
    lines.push(`  - ${resourceLabel(manifest.kind, manifest.name, manifest.namespace)} [${manifest.apiVersion}]`);
  }
  return lines.join('\n');
}

export function renderRevisionMetadata(applicationName: string, summary: RevisionMetadataSummary): string {
  const lines = [
    `Revision ${summary.revision} of application '${applicationName}'`,
    `Author: ${summary.author ?? NONE}`,
    `Date: ${summary.date ?? NONE}`,
    `Message: ${summary.messageShort ?? NONE}`,
    `Tags: ${summary.tagCount > 0 ? summary.tags.join(', ') : NONE}`,
    `Signature: ${summary.signatureStatus ?? 'unsigned'}`,
  ];
  return lines.join('\n');
}

// ============================================================================
// Sync Windows
// ============================================================================

function windowLine(window: SyncWindowSummary): string {
  const zone = window.timeZone ? ` ${window.timeZone}` : '';
  const manual = window.manualSync ? ', manual sync allowed' : '';
  return `  - ${window.kind} '${window.schedule}' for ${window.duration}${zone}${manual}`;
}

export function renderSyncWindows(summary: SyncWindowsSummary): string {
  const lines = [
    `Sync windows for application '${summary.applicationName}'`,
    `Sync currently permitted: ${summary.canSync ? 'yes' : 'no'}`,
    '',
    'Active windows:',
  ];
  lines.push(...(summary.activeWindows.length > 0 ? summary.activeWindows.map(windowLine) : ['  (none)']));
  lines.push('', 'Assigned windows:');
  lines.push(...(summary.assignedWindows.length > 0 ? summary.assignedWindows.map(windowLine) : ['  (none)']));
  return lines.join('\n');
}

// ============================================================================
// Single Resources
// ============================================================================

export function renderResource(summary: ResourceSummary, heading = 'Resource'): string {
  const manifest = summary.manifestSummary;
  const lines = [
    `${heading} ${resourceLabel(summary.kind, summary.resourceName, summary.namespace)} in application '${summary.applicationName}'`,
    `API version: ${manifest.apiVersion ?? (summary.group ? `${summary.group}/${summary.version}` : summary.version)}`,
  ];
  if (manifest.creationTimestamp) lines.push(`Created: ${manifest.creationTimestamp}`);
  if (manifest.statusSummary) lines.push(`Status: ${manifest.statusSummary}`);
  const labels = Object.entries(manifest.labels);
  if (labels.length > 0) lines.push(`Labels: ${labels.map(([k, v]) => `${k}=${v}`).join(', ')}`);
  if (manifest.annotationsCount > 0) lines.push(`Annotations: ${manifest.annotationsCount}`);
  lines.push('', 'Manifest:', summary.manifest);
  return lines.join('\n');
}

// ============================================================================
// Operations
// ============================================================================

export function renderSync(summary: SyncSummary): string {
  const lines = [
    `${summary.dryRun ? 'Dry-run sync' : 'Sync'} requested for application '${summary.name}'`,
    `Sync status: ${summary.syncStatus ?? NONE}`,
    `Health status: ${summary.healthStatus ?? NONE}`,
    `Target revision: ${summary.targetRevision ?? NONE}`,
    `Prune: ${summary.pruneEnabled}, Force: ${summary.forceEnabled}`,
  ];
  if (summary.operationPhase) lines.push(`Operation phase: ${summary.operationPhase}`);
  if (summary.syncOptions.length > 0) lines.push(`Sync options: ${summary.syncOptions.join(', ')}`);
  if (summary.resourcesCount !== undefined) lines.push(`Resources selected: ${summary.resourcesCount}`);
  return lines.join('\n');
}

export function renderRollback(summary: RollbackSummary): string {
  const lines = [
    `${summary.dryRun ? 'Dry-run rollback' : 'Rollback'} of application '${summary.name}' to history id ${summary.rolledBackToId}`,
    `Sync status: ${summary.syncStatus ?? NONE}`,
    `Health status: ${summary.healthStatus ?? NONE}`,
    `Target revision: ${summary.targetRevision ?? NONE}`,
    `Prune: ${summary.pruneEnabled}`,
  ];
  if (summary.operationPhase) lines.push(`Operation phase: ${summary.operationPhase}`);
  return lines.join('\n');
}

function changeLine(label: string, before: string | undefined, after: string | undefined, changed: boolean): string {
  return changed
    ? `${label}: ${before ?? NONE} -> ${after ?? NONE}`
    : `${label}: ${after ?? NONE} (unchanged)`;
}

export function renderRefresh(summary: RefreshSummary): string {
  return [
    `Refreshed application '${summary.name}' (${summary.refreshType})`,
    changeLine('Sync status', summary.syncStatusBefore, summary.syncStatusAfter, summary.syncStatusChanged),
    changeLine('Health status', summary.healthStatusBefore, summary.healthStatusAfter, summary.healthStatusChanged),
    changeLine('Revision', summary.revisionBefore, summary.revisionAfter, summary.revisionChanged),
  ].join('\n');
}
