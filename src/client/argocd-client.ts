/**
 * @module client/argocd-client
 * @description Authenticated Argo CD REST client returning validated payloads as Results
 * @status COMPLETE
 * @see https://argo-cd.readthedocs.io/en/stable/developer-guide/api-docs/
 * @dependencies undici, zod, src/types, src/client/errors.ts
 * @lastModified 2026-10-19
 */

import { Agent, fetch as undiciFetch, type Dispatcher, type RequestInit, type Response } from 'undici';
import type { z } from 'zod';

import {
  ApplicationListSchema,
  ApplicationSchema,
  ApplicationTreeSchema,
  EventListSchema,
  ManifestResponseSchema,
  ResourceResponseSchema,
  RevisionMetadataSchema,
  ServerSideDiffResponseSchema,
  SyncWindowsResponseSchema,
  type Application,
  type ApplicationList,
  type ApplicationTree,
  type KubeEvent,
  type ManifestResponse,
  type ResourceResponse,
  type RevisionMetadata,
  type ServerSideDiffResponse,
  type SyncWindowsResponse,
} from '../types/argocd.js';
import type { RawLogLine } from '../types/summaries.js';
import { ok, err, argoError, type Result, type ArgoCDError } from '../types/common.js';
import { REQUEST_DEFAULTS } from '../constants.js';
import { parseLogStream } from '../analyzer/log-analyzer.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { networkError, parseError, redactSecrets, upstreamError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/** The subset of fetch the client needs; replaced in tests */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface ClientOptions {
  baseUrl: string;
  accessToken: string;
  /** Skip TLS certificate verification */
  insecure?: boolean;
  timeoutMs?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/** Per-call controls */
export interface CallOptions {
  /** Aborts the request, e.g. when the MCP client cancels the tool call */
  signal?: AbortSignal;
}

type QueryValue = string | number | boolean | readonly string[] | readonly number[] | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Scoping accepted by almost every application route */
export interface AppScope {
  name: string;
  appNamespace?: string;
  project?: string;
}

export interface ListApplicationsParams {
  name?: string;
  projects?: string[];
  selector?: string;
  repo?: string;
  appNamespace?: string;
}

export interface GetApplicationParams extends AppScope {
  refresh?: 'normal' | 'hard';
  resourceVersion?: string;
}

export interface ResourceTreeParams extends AppScope {
  namespace?: string;
  resourceName?: string;
  version?: string;
  group?: string;
  kind?: string;
}

export interface ServerSideDiffParams extends AppScope {
  targetManifests?: string[];
}

export interface ResourceEventsParams extends AppScope {
  resourceNamespace?: string;
  resourceName?: string;
  resourceUID?: string;
}

export interface PodLogsParams extends AppScope {
  namespace?: string;
  podName?: string;
  container?: string;
  sinceSeconds?: number;
  tailLines?: number;
  previous?: boolean;
  filter?: string;
  kind?: string;
  group?: string;
  resourceName?: string;
}

export interface ManifestsParams extends AppScope {
  revision?: string;
  sourcePositions?: number[];
  revisions?: string[];
}

export interface RevisionMetadataParams extends AppScope {
  revision: string;
  sourceIndex?: number;
  versionId?: number;
}

export interface ResourceParams extends AppScope {
  resourceName: string;
  kind: string;
  version: string;
  namespace?: string;
  group?: string;
}

export interface SyncResource {
  group?: string;
  kind: string;
  name: string;
  namespace?: string;
}

export interface RetryPolicy {
  limit?: number;
  backoff?: {
    duration?: string;
    maxDuration?: string;
    factor?: number;
  };
}

export interface SyncParams extends AppScope {
  revision?: string;
  dryRun?: boolean;
  prune?: boolean;
  force?: boolean;
  /** Apply strategy (kubectl apply) or hook strategy */
  strategy?: 'apply' | 'hook';
  resources?: SyncResource[];
  syncOptions?: string[];
  retry?: RetryPolicy;
}

export interface RollbackParams extends AppScope {
  id: number;
  dryRun?: boolean;
  prune?: boolean;
}

export interface PatchResourceParams extends ResourceParams {
  /** Patch document as a string */
  patch: string;
  patchType?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Encode query parameters. Arrays repeat their key; undefined values are
 * skipped.
 */
export function buildQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  return query.length > 0 ? `?${query}` : '';
}

export function applicationPath(name: string, suffix = ''): string {
  return `${REQUEST_DEFAULTS.API_PREFIX}/applications/${encodeURIComponent(name)}${suffix}`;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

// ============================================================================
// Client
// ============================================================================

/**
 * Argo CD REST client.
 *
 * Every method resolves to a Result; upstream statuses, transport failures
 * and malformed bodies come back as ArgoCDError values, never as throws.
 * The client holds no mutable state after construction.
 */
export class ArgoCDClient {
  readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly logger: Logger;

  private constructor(options: ClientOptions) {
    this.baseUrl = options.baseUrl.trim().replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? REQUEST_DEFAULTS.TIMEOUT_MS;
    this.fetchFn = options.fetch ?? undiciFetch;
    this.dispatcher = options.insecure
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate options and build a client
   */
  static create(options: ClientOptions): Result<ArgoCDClient, ArgoCDError> {
    if (options.baseUrl.trim().length === 0) {
      return err(argoError('Configuration', 'Base URL cannot be empty'));
    }
    if (options.accessToken.trim().length === 0) {
      return err(argoError('Configuration', 'Access token cannot be empty'));
    }
    return ok(new ArgoCDClient(options));
  }

  /**
   * Release pooled connections
   */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  private async request(
    method: 'GET' | 'POST',
    path: string,
    query: QueryParams,
    options: CallOptions & { body?: unknown } = {}
  ): Promise<Result<string, ArgoCDError>> {
    const url = `${this.baseUrl}${path}${buildQuery(query)}`;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.accessToken}`,
      Accept: 'application/json',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const init: RequestInit = { method, headers, signal: controller.signal };
    if (options.body !== undefined) init.body = JSON.stringify(options.body);
    if (this.dispatcher) init.dispatcher = this.dispatcher;

    this.logger.debug(`${method} ${path}`);

    try {
      const response = await this.fetchFn(url, init);
      const text = await response.text();
      if (response.status < 200 || response.status >= 300) {
        this.logger.debug(`${method} ${path} -> ${response.status}`);
        return err(upstreamError(response.status, text, [this.accessToken]));
      }
      return ok(text);
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        return err(
          timedOut
            ? networkError(`Request to ${path} timed out after ${this.timeoutMs}ms`, error)
            : networkError(`Request to ${path} was cancelled`, error)
        );
      }
      const detail = error instanceof Error ? error.message : String(error);
      return err(networkError(`Request to ${path} failed: ${detail}`, error, [this.accessToken]));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async requestJson<S extends z.ZodTypeAny>(
    schema: S,
    method: 'GET' | 'POST',
    path: string,
    query: QueryParams,
    options: CallOptions & { body?: unknown } = {}
  ): Promise<Result<z.output<S>, ArgoCDError>> {
    const response = await this.request(method, path, query, options);
    if (!response.success) return response;

    let value: unknown;
    try {
      value = JSON.parse(response.data);
    } catch {
      return err(parseError(`Response from ${path} is not valid JSON`));
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return err(
        parseError(`Unexpected response shape from ${path}${where}: ${redactSecrets(issue?.message ?? 'invalid', [this.accessToken])}`)
      );
    }
    return ok(parsed.data);
  }

  // --------------------------------------------------------------------------
  // Applications
  // --------------------------------------------------------------------------

  async listApplications(
    params: ListApplicationsParams = {},
    options: CallOptions = {}
  ): Promise<Result<ApplicationList, ArgoCDError>> {
    return this.requestJson(ApplicationListSchema, 'GET', `${REQUEST_DEFAULTS.API_PREFIX}/applications`, {
      name: params.name,
      projects: params.projects,
      selector: params.selector,
      repo: params.repo,
      appNamespace: params.appNamespace,
    }, options);
  }

  async getApplication(
    params: GetApplicationParams,
    options: CallOptions = {}
  ): Promise<Result<Application, ArgoCDError>> {
    return this.requestJson(ApplicationSchema, 'GET', applicationPath(params.name), {
      appNamespace: params.appNamespace,
      project: params.project,
      refresh: params.refresh,
      resourceVersion: params.resourceVersion,
    }, options);
  }

  async getResourceTree(
    params: ResourceTreeParams,
    options: CallOptions = {}
  ): Promise<Result<ApplicationTree, ArgoCDError>> {
    return this.requestJson(ApplicationTreeSchema, 'GET', applicationPath(params.name, '/resource-tree'), {
      namespace: params.namespace,
      name: params.resourceName,
      version: params.version,
      group: params.group,
      kind: params.kind,
      appNamespace: params.appNamespace,
      project: params.project,
    }, options);
  }

  async serverSideDiff(
    params: ServerSideDiffParams,
    options: CallOptions = {}
  ): Promise<Result<ServerSideDiffResponse, ArgoCDError>> {
    return this.requestJson(ServerSideDiffResponseSchema, 'GET', applicationPath(params.name, '/server-side-diff'), {
      appNamespace: params.appNamespace,
      project: params.project,
      targetManifests: params.targetManifests,
    }, options);
  }

  async listResourceEvents(
    params: ResourceEventsParams,
    options: CallOptions = {}
  ): Promise<Result<KubeEvent[], ArgoCDError>> {
    const result = await this.requestJson(EventListSchema, 'GET', applicationPath(params.name, '/events'), {
      resourceNamespace: params.resourceNamespace,
      resourceName: params.resourceName,
      resourceUID: params.resourceUID,
      appNamespace: params.appNamespace,
      project: params.project,
    }, options);
    return result.success ? ok(result.data.items) : result;
  }

  /**
   * Fetch a finite log window. `follow` is always false; the stream ends
   * once the requested lines are sent.
   */
  async podLogs(
    params: PodLogsParams,
    options: CallOptions = {}
  ): Promise<Result<RawLogLine[], ArgoCDError>> {
    const body = await this.request('GET', applicationPath(params.name, '/logs'), {
      namespace: params.namespace,
      podName: params.podName,
      container: params.container,
      sinceSeconds: params.sinceSeconds,
      tailLines: params.tailLines ?? REQUEST_DEFAULTS.TAIL_LINES,
      previous: params.previous ? true : undefined,
      filter: params.filter,
      kind: params.kind,
      group: params.group,
      resourceName: params.resourceName,
      appNamespace: params.appNamespace,
      project: params.project,
      follow: false,
    }, options);
    if (!body.success) return body;
    return parseLogStream(body.data, { container: params.container });
  }

  async getManifests(
    params: ManifestsParams,
    options: CallOptions = {}
  ): Promise<Result<ManifestResponse, ArgoCDError>> {
    return this.requestJson(ManifestResponseSchema, 'GET', applicationPath(params.name, '/manifests'), {
      revision: params.revision,
      appNamespace: params.appNamespace,
      project: params.project,
      sourcePositions: params.sourcePositions,
      revisions: params.revisions,
    }, options);
  }

  async revisionMetadata(
    params: RevisionMetadataParams,
    options: CallOptions = {}
  ): Promise<Result<RevisionMetadata, ArgoCDError>> {
    const suffix = `/revisions/${encodeURIComponent(params.revision)}/metadata`;
    return this.requestJson(RevisionMetadataSchema, 'GET', applicationPath(params.name, suffix), {
      appNamespace: params.appNamespace,
      project: params.project,
      sourceIndex: params.sourceIndex,
      versionId: params.versionId,
    }, options);
  }

  async getSyncWindows(
    params: AppScope,
    options: CallOptions = {}
  ): Promise<Result<SyncWindowsResponse, ArgoCDError>> {
    return this.requestJson(SyncWindowsResponseSchema, 'GET', applicationPath(params.name, '/syncwindows'), {
      appNamespace: params.appNamespace,
      project: params.project,
    }, options);
  }

  async getResource(
    params: ResourceParams,
    options: CallOptions = {}
  ): Promise<Result<ResourceResponse, ArgoCDError>> {
    return this.requestJson(ResourceResponseSchema, 'GET', applicationPath(params.name, '/resource'), {
      namespace: params.namespace,
      resourceName: params.resourceName,
      version: params.version,
      group: params.group,
      kind: params.kind,
      appNamespace: params.appNamespace,
      project: params.project,
    }, options);
  }

  // --------------------------------------------------------------------------
  // Writes (callers must pass the mutation gate first)
  // --------------------------------------------------------------------------

  async syncApplication(
    params: SyncParams,
    options: CallOptions = {}
  ): Promise<Result<Application, ArgoCDError>> {
    const body: Record<string, unknown> = {
      name: params.name,
      dryRun: params.dryRun ?? false,
      prune: params.prune ?? false,
    };
    if (params.revision !== undefined) body['revision'] = params.revision;
    if (params.force || params.strategy) {
      body['strategy'] = params.strategy === 'hook'
        ? { hook: { force: params.force ?? false } }
        : { apply: { force: params.force ?? false } };
    }
    if (params.resources && params.resources.length > 0) body['resources'] = params.resources;
    if (params.syncOptions && params.syncOptions.length > 0) body['syncOptions'] = { items: params.syncOptions };
    if (params.retry) body['retryStrategy'] = params.retry;
    if (params.appNamespace !== undefined) body['appNamespace'] = params.appNamespace;
    if (params.project !== undefined) body['project'] = params.project;

    return this.requestJson(ApplicationSchema, 'POST', applicationPath(params.name, '/sync'), {}, { ...options, body });
  }

  async rollbackApplication(
    params: RollbackParams,
    options: CallOptions = {}
  ): Promise<Result<Application, ArgoCDError>> {
    const body: Record<string, unknown> = {
      name: params.name,
      id: params.id,
      dryRun: params.dryRun ?? false,
      prune: params.prune ?? false,
    };
    if (params.appNamespace !== undefined) body['appNamespace'] = params.appNamespace;
    if (params.project !== undefined) body['project'] = params.project;

    return this.requestJson(ApplicationSchema, 'POST', applicationPath(params.name, '/rollback'), {}, { ...options, body });
  }

  /**
   * Patch one managed resource. The API takes the patch document as a JSON
   * string body.
   */
  async patchResource(
    params: PatchResourceParams,
    options: CallOptions = {}
  ): Promise<Result<ResourceResponse, ArgoCDError>> {
    return this.requestJson(ResourceResponseSchema, 'POST', applicationPath(params.name, '/resource'), {
      namespace: params.namespace,
      resourceName: params.resourceName,
      version: params.version,
      group: params.group,
      kind: params.kind,
      patchType: params.patchType ?? 'application/merge-patch+json',
      appNamespace: params.appNamespace,
      project: params.project,
    }, { ...options, body: params.patch });
  }
}
