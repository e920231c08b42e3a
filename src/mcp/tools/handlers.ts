/**
 * @module mcp/tools/handlers
 * @description One handler per MCP tool: gate, client call, summarize, render
 * @status COMPLETE
 * @dependencies src/client, src/gate, src/analyzer, src/output/formatters
 * @lastModified 2026-10-19
 */

import type { ArgoCDClient, AppScope } from '../../client/argocd-client.js';
import { formatError } from '../../client/errors.js';
import { checkWrite, type MutationGate, type WriteOperation } from '../../gate/mutation-gate.js';
import type { Logger } from '../../logger.js';
import type { ArgoCDError } from '../../types/common.js';
import {
  aggregateEvents,
  analyzePodLogs,
  applicationNames,
  compareRefresh,
  formatHistory,
  summarizeApplication,
  summarizeApplicationDetail,
  summarizeManifests,
  summarizeResource,
  summarizeResourceTree,
  summarizeRevisionMetadata,
  summarizeRollback,
  summarizeServerSideDiff,
  summarizeSync,
  summarizeSyncWindows,
  toResourceNodes,
} from '../../analyzer/index.js';
import {
  noLogsMessage,
  renderApplicationDetail,
  renderApplicationList,
  renderApplicationNames,
  renderEventsReport,
  renderHistoryReport,
  renderManifests,
  renderPodLogsReport,
  renderRefresh,
  renderResource,
  renderResourceTreeReport,
  renderRevisionMetadata,
  renderRollback,
  renderServerSideDiffReport,
  renderSync,
  renderSyncWindows,
} from '../../output/formatters/index.js';
import { toolError, toolJSON, toolReport, toolSuccess, type ToolResult } from './results.js';
import type {
  GetApplicationArgs,
  HistoryArgs,
  ListApplicationNamesArgs,
  ListApplicationsArgs,
  ManifestsArgs,
  PatchResourceArgs,
  PodLogsArgs,
  RefreshArgs,
  ResourceArgs,
  ResourceEventsArgs,
  ResourceTreeArgs,
  RevisionMetadataArgs,
  RollbackArgs,
  ServerSideDiffArgs,
  SyncArgs,
  SyncWindowsArgs,
} from './schemas.js';

export interface ToolDependencies {
  client: ArgoCDClient;
  gate: MutationGate;
  logger: Logger;
}

function scopeOf(args: { applicationName: string; appNamespace?: string; project?: string }): AppScope {
  return { name: args.applicationName, appNamespace: args.appNamespace, project: args.project };
}

function notFound(what: string, applicationName: string): ToolResult {
  return toolSuccess(`No ${what} found for application '${applicationName}'`);
}

/**
 * Tool handlers. Each method resolves to a tool result and never throws for
 * upstream conditions; failures come back as `isError` results.
 */
export class ToolHandlers {
  private readonly client: ArgoCDClient;
  private readonly gate: MutationGate;
  private readonly logger: Logger;

  constructor(deps: ToolDependencies) {
    this.client = deps.client;
    this.gate = deps.gate;
    this.logger = deps.logger;
  }

  private failure(tool: string, error: ArgoCDError): ToolResult {
    this.logger.warn(`${tool} failed: ${formatError(error)}`);
    return toolError(error.message);
  }

  private guard(operation: WriteOperation): ToolResult | undefined {
    const allowed = checkWrite(this.gate, operation);
    if (allowed.success) return undefined;
    return this.failure(operation, allowed.error);
  }

  // ==========================================================================
  // Applications
  // ==========================================================================

  async listApplications(args: ListApplicationsArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.listApplications(args, { signal });
    if (!result.success) return this.failure('list_applications', result.error);

    const apps = result.data.items.map(summarizeApplication);
    if (apps.length === 0) return toolSuccess(renderApplicationList(apps));
    return toolReport(renderApplicationList(apps), apps);
  }

  async listApplicationNames(args: ListApplicationNamesArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.listApplications(args, { signal });
    if (!result.success) return this.failure('list_application_names', result.error);

    const names = applicationNames(result.data.items);
    if (names.length === 0) return toolSuccess(renderApplicationNames(names));
    return toolReport(renderApplicationNames(names), names);
  }

  async getApplication(args: GetApplicationArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getApplication(
      { ...scopeOf(args), refresh: args.refresh, resourceVersion: args.resourceVersion },
      { signal }
    );
    if (!result.success) return this.failure('get_application', result.error);
    if (args.full) return toolJSON(result.data);

    const detail = summarizeApplicationDetail(result.data);
    return toolReport(renderApplicationDetail(detail), detail);
  }

  async getManifests(args: ManifestsArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getManifests(
      {
        ...scopeOf(args),
        revision: args.revision,
        sourcePositions: args.sourcePositions,
        revisions: args.revisions,
      },
      { signal }
    );
    if (!result.success) return this.failure('get_manifests', result.error);

    const summary = summarizeManifests(result.data);
    if (summary.totalManifests === 0) return notFound('manifests', args.applicationName);
    return toolReport(renderManifests(args.applicationName, summary), summary);
  }

  async revisionMetadata(args: RevisionMetadataArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.revisionMetadata(
      {
        ...scopeOf(args),
        revision: args.revision,
        sourceIndex: args.sourceIndex,
        versionId: args.versionId,
      },
      { signal }
    );
    if (!result.success) return this.failure('revision_metadata', result.error);

    const summary = summarizeRevisionMetadata(args.revision, result.data);
    return toolReport(renderRevisionMetadata(args.applicationName, summary), summary);
  }

  async getSyncWindows(args: SyncWindowsArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getSyncWindows(scopeOf(args), { signal });
    if (!result.success) return this.failure('get_sync_windows', result.error);

    const summary = summarizeSyncWindows(args.applicationName, result.data);
    return toolReport(renderSyncWindows(summary), summary);
  }

  /**
   * Read the application, then read it again with a refresh annotation, and
   * report what changed.
   */
  async refreshApplication(args: RefreshArgs, signal?: AbortSignal): Promise<ToolResult> {
    const refreshType = args.refreshType ?? 'normal';
    const before = await this.client.getApplication(scopeOf(args), { signal });
    if (!before.success) return this.failure('refresh_application', before.error);

    const after = await this.client.getApplication({ ...scopeOf(args), refresh: refreshType }, { signal });
    if (!after.success) return this.failure('refresh_application', after.error);

    const summary = compareRefresh(args.applicationName, refreshType, before.data, after.data);
    return toolReport(renderRefresh(summary), summary);
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  async resourceTree(args: ResourceTreeArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getResourceTree(
      {
        ...scopeOf(args),
        namespace: args.namespace,
        resourceName: args.resourceName,
        version: args.version,
        group: args.group,
        kind: args.kind,
      },
      { signal }
    );
    if (!result.success) return this.failure('resource_tree', result.error);
    if (args.full) return toolJSON(result.data);

    const nodes = toResourceNodes(result.data);
    if (nodes.length === 0) return notFound('resources', args.applicationName);
    const summary = summarizeResourceTree(nodes, result.data.hosts.flatMap((host) => (host.name ? [host.name] : [])));
    return toolReport(renderResourceTreeReport(args.applicationName, summary), summary);
  }

  async serverSideDiff(args: ServerSideDiffArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.serverSideDiff(
      { ...scopeOf(args), targetManifests: args.targetManifests },
      { signal }
    );
    if (!result.success) return this.failure('server_side_diff', result.error);
    if (args.full) return toolJSON(result.data);

    if (result.data.items.length === 0) return notFound('resource differences', args.applicationName);
    const summary = summarizeServerSideDiff(result.data.items);
    return toolReport(renderServerSideDiffReport(args.applicationName, summary), summary);
  }

  async listResourceEvents(args: ResourceEventsArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.listResourceEvents(
      {
        ...scopeOf(args),
        resourceNamespace: args.resourceNamespace,
        resourceName: args.resourceName,
        resourceUID: args.resourceUID,
      },
      { signal }
    );
    if (!result.success) return this.failure('list_resource_events', result.error);
    if (args.full) return toolJSON(result.data);

    if (result.data.length === 0) return notFound('events', args.applicationName);
    const summary = aggregateEvents(result.data);
    return toolReport(renderEventsReport(args.applicationName, summary), summary);
  }

  async podLogs(args: PodLogsArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.podLogs(
      {
        ...scopeOf(args),
        namespace: args.namespace,
        podName: args.podName,
        container: args.container,
        sinceSeconds: args.sinceSeconds,
        tailLines: args.tailLines,
        previous: args.previous,
        filter: args.filter,
        kind: args.kind,
        group: args.group,
        resourceName: args.resourceName,
      },
      { signal }
    );
    if (!result.success) return this.failure('pod_logs', result.error);

    const summary = analyzePodLogs(result.data, {
      tailLines: args.tailLines,
      errorsOnly: args.errorsOnly,
      podName: args.podName,
      container: args.container,
    });
    if (summary.totalLines === 0) return toolSuccess(noLogsMessage(args.applicationName, summary));
    return toolReport(renderPodLogsReport(args.applicationName, summary), summary);
  }

  async getApplicationHistory(args: HistoryArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getApplication(scopeOf(args), { signal });
    if (!result.success) return this.failure('get_application_history', result.error);

    const history = result.data.status?.history ?? [];
    if (args.full) return toolJSON(history);

    const summary = formatHistory(args.applicationName, history);
    if (summary.isEmpty) return notFound('deployment history', args.applicationName);
    return toolReport(renderHistoryReport(summary), summary);
  }

  async getResource(args: ResourceArgs, signal?: AbortSignal): Promise<ToolResult> {
    const result = await this.client.getResource(
      {
        ...scopeOf(args),
        resourceName: args.resourceName,
        kind: args.kind,
        version: args.version,
        namespace: args.namespace,
        group: args.group,
      },
      { signal }
    );
    if (!result.success) return this.failure('get_resource', result.error);

    const summary = summarizeResource(
      {
        applicationName: args.applicationName,
        kind: args.kind,
        resourceName: args.resourceName,
        namespace: args.namespace,
        version: args.version,
        group: args.group,
      },
      result.data.manifest ?? ''
    );
    return toolReport(renderResource(summary), summary);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async syncApplication(args: SyncArgs, signal?: AbortSignal): Promise<ToolResult> {
    const blocked = this.guard('sync_application');
    if (blocked) return blocked;

    this.logger.info(`sync_application: ${args.applicationName}${args.dryRun ? ' (dry run)' : ''}`);
    const result = await this.client.syncApplication(
      {
        ...scopeOf(args),
        revision: args.revision,
        dryRun: args.dryRun,
        prune: args.prune,
        force: args.force,
        strategy: args.strategy,
        resources: args.resources,
        syncOptions: args.syncOptions,
        retry: args.retry,
      },
      { signal }
    );
    if (!result.success) return this.failure('sync_application', result.error);

    const summary = summarizeSync(args.applicationName, result.data, {
      dryRun: args.dryRun ?? false,
      prune: args.prune ?? false,
      force: args.force ?? false,
      syncOptions: args.syncOptions ?? [],
      resourcesCount: args.resources?.length,
    });
    return toolReport(renderSync(summary), summary);
  }

  async rollbackApplication(args: RollbackArgs, signal?: AbortSignal): Promise<ToolResult> {
    const blocked = this.guard('rollback_application');
    if (blocked) return blocked;

    this.logger.info(`rollback_application: ${args.applicationName} to id ${args.id}`);
    const result = await this.client.rollbackApplication(
      { ...scopeOf(args), id: args.id, dryRun: args.dryRun, prune: args.prune },
      { signal }
    );
    if (!result.success) return this.failure('rollback_application', result.error);

    const summary = summarizeRollback(args.applicationName, result.data, {
      id: args.id,
      dryRun: args.dryRun ?? false,
      prune: args.prune ?? false,
    });
    return toolReport(renderRollback(summary), summary);
  }

  async patchResource(args: PatchResourceArgs, signal?: AbortSignal): Promise<ToolResult> {
    const blocked = this.guard('patch_resource');
    if (blocked) return blocked;

    this.logger.info(`patch_resource: ${args.kind}/${args.resourceName} in ${args.applicationName}`);
    const result = await this.client.patchResource(
      {
        ...scopeOf(args),
        resourceName: args.resourceName,
        kind: args.kind,
        version: args.version,
        namespace: args.namespace,
        group: args.group,
        patch: args.patch,
        patchType: args.patchType,
      },
      { signal }
    );
    if (!result.success) return this.failure('patch_resource', result.error);

    const summary = summarizeResource(
      {
        applicationName: args.applicationName,
        kind: args.kind,
        resourceName: args.resourceName,
        namespace: args.namespace,
        version: args.version,
        group: args.group,
      },
      result.data.manifest ?? ''
    );
    return toolReport(renderResource(summary, 'Patched'), summary);
  }
}
