/**
 * @module mcp/server
 * @description MCP (Model Context Protocol) server exposing Argo CD to AI assistants
 * @status COMPLETE
 * @dependencies @modelcontextprotocol/sdk, src/client, src/gate, src/mcp/tools
 * @lastModified 2026-10-19
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import type { BridgeConfig } from '../config.js';
import { SERVER_INFO } from '../constants.js';
import { ArgoCDClient, type FetchFn } from '../client/argocd-client.js';
import { createMutationGate, isReadOnly, type MutationGate } from '../gate/mutation-gate.js';
import { createLogger, type Logger } from '../logger.js';
import { ok, type ArgoCDError, type Result } from '../types/common.js';
import {
  ToolHandlers,
  ListApplicationsArgsSchema,
  ListApplicationNamesArgsSchema,
  GetApplicationArgsSchema,
  ServerSideDiffArgsSchema,
  ResourceTreeArgsSchema,
  ResourceEventsArgsSchema,
  PodLogsArgsSchema,
  ManifestsArgsSchema,
  RevisionMetadataArgsSchema,
  HistoryArgsSchema,
  SyncWindowsArgsSchema,
  ResourceArgsSchema,
  RefreshArgsSchema,
  SyncArgsSchema,
  RollbackArgsSchema,
  PatchResourceArgsSchema,
} from './tools/index.js';

// ============================================================================
// Server State
// ============================================================================

/**
 * Everything the tools share. Built once at startup, read-only afterwards.
 */
export interface ServerState {
  readonly config: BridgeConfig;
  readonly gate: MutationGate;
  readonly client: ArgoCDClient;
  readonly logger: Logger;
}

/**
 * Optional overrides, used by tests and embedders
 */
export interface ServerOptions {
  fetch?: FetchFn;
  logger?: Logger;
  /** Defaults to stdio */
  transport?: Transport;
}

/**
 * Instructions shown to the assistant on initialize
 */
export function buildInstructions(readOnly: boolean): string {
  const lines = [
    'Tools for inspecting Argo CD applications: status, resource trees, diffs, events, pod logs, manifests and deployment history.',
    'Reports come first as text, followed by the same summary as JSON.',
    'Pass full: true on tree, diff, event, history and application tools for the raw payload.',
  ];
  if (readOnly) {
    lines.push(
      'READ-ONLY MODE: sync_application, rollback_application and patch_resource are blocked (ARGOCD_READ_ONLY=true).'
    );
  }
  return lines.join('\n');
}

// ============================================================================
// MCP Server Class
// ============================================================================

/**
 * Argo CD MCP Server
 *
 * Exposes tools for AI assistants to:
 * - List and inspect applications
 * - Summarize resource trees, diffs, events and pod logs
 * - Read deployment history and revision metadata
 * - Sync, roll back and patch (unless read-only)
 */
export class ArgoCDMCPServer {
  private mcpServer: McpServer;
  private state: ServerState;
  private handlers: ToolHandlers;
  private transport: Transport | undefined;

  constructor(state: ServerState, transport?: Transport) {
    this.state = state;
    this.transport = transport;
    this.handlers = new ToolHandlers({ client: state.client, gate: state.gate, logger: state.logger });

    this.mcpServer = new McpServer(
      {
        name: SERVER_INFO.NAME,
        version: SERVER_INFO.VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions: buildInstructions(isReadOnly(state.gate)),
      }
    );

    this.registerTools();
  }

  /**
   * Build the server from a validated config
   */
  static create(config: BridgeConfig, options: ServerOptions = {}): Result<ArgoCDMCPServer, ArgoCDError> {
    const logger = options.logger ?? createLogger({ verbose: config.verbose });
    const client = ArgoCDClient.create({
      baseUrl: config.baseUrl,
      accessToken: config.accessToken,
      insecure: config.insecure,
      timeoutMs: config.timeoutMs,
      fetch: options.fetch,
      logger,
    });
    if (!client.success) return client;

    const gate = createMutationGate(config.readOnly);
    return ok(new ArgoCDMCPServer({ config, gate, client: client.data, logger }, options.transport));
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    const transport = this.transport ?? new StdioServerTransport();
    await this.mcpServer.connect(transport);

    const { config, logger } = this.state;
    logger.info(`Connected to ${config.baseUrl}${config.readOnly ? ' (read-only)' : ''}`);
    if (config.insecure) {
      logger.warn('TLS certificate verification is disabled (ARGOCD_INSECURE=true)');
    }
  }

  /**
   * Stop the MCP server and release the HTTP connection pool
   */
  async stop(): Promise<void> {
    await this.mcpServer.close();
    await this.state.client.close();
    this.state.logger.info('Argo CD MCP server stopped');
  }

  /**
   * Get server state (for tests)
   */
  getState(): ServerState {
    return this.state;
  }

  /**
   * Get the tool handlers (for tests)
   */
  getHandlers(): ToolHandlers {
    return this.handlers;
  }

  /**
   * Register all MCP tools
   */
  private registerTools(): void {
    const handlers = this.handlers;

    // ========================================================================
    // Applications
    // ========================================================================

    this.mcpServer.tool(
      'list_applications',
      'List Argo CD applications with sync status, health and source. Filter by project, label selector or repository.',
      ListApplicationsArgsSchema.shape,
      async (args, extra) => handlers.listApplications(args, extra.signal)
    );

    this.mcpServer.tool(
      'list_application_names',
      'List only the names of Argo CD applications, sorted. Cheaper than list_applications.',
      ListApplicationNamesArgsSchema.shape,
      async (args, extra) => handlers.listApplicationNames(args, extra.signal)
    );

    this.mcpServer.tool(
      'get_application',
      'Get one application: source, destination, sync and health status, sync policy.',
      GetApplicationArgsSchema.shape,
      async (args, extra) => handlers.getApplication(args, extra.signal)
    );

    this.mcpServer.tool(
      'get_manifests',
      'List the manifests Argo CD renders for an application, grouped by kind.',
      ManifestsArgsSchema.shape,
      async (args, extra) => handlers.getManifests(args, extra.signal)
    );

    this.mcpServer.tool(
      'revision_metadata',
      'Get the author, date, message, tags and signature status of a revision.',
      RevisionMetadataArgsSchema.shape,
      async (args, extra) => handlers.revisionMetadata(args, extra.signal)
    );

    this.mcpServer.tool(
      'get_sync_windows',
      'Show active and assigned sync windows and whether a sync may run now.',
      SyncWindowsArgsSchema.shape,
      async (args, extra) => handlers.getSyncWindows(args, extra.signal)
    );

    this.mcpServer.tool(
      'refresh_application',
      'Refresh an application from its source and report what changed in sync status, health and revision.',
      RefreshArgsSchema.shape,
      async (args, extra) => handlers.refreshApplication(args, extra.signal)
    );

    // ========================================================================
    // Diagnostics
    // ========================================================================

    this.mcpServer.tool(
      'resource_tree',
      'Summarize the resource tree: counts by kind and health, orphaned resources, a sample of nodes.',
      ResourceTreeArgsSchema.shape,
      async (args, extra) => handlers.resourceTree(args, extra.signal)
    );

    this.mcpServer.tool(
      'server_side_diff',
      'Compare live and target state with a server-side dry run and list modified resources.',
      ServerSideDiffArgsSchema.shape,
      async (args, extra) => handlers.serverSideDiff(args, extra.signal)
    );

    this.mcpServer.tool(
      'list_resource_events',
      'Summarize Kubernetes events for an application or one of its resources, most recent first.',
      ResourceEventsArgsSchema.shape,
      async (args, extra) => handlers.listResourceEvents(args, extra.signal)
    );

    this.mcpServer.tool(
      'pod_logs',
      'Fetch recent pod logs, classify each line by level and flag potential issues. Use errorsOnly to list only problems.',
      PodLogsArgsSchema.shape,
      async (args, extra) => handlers.podLogs(args, extra.signal)
    );

    this.mcpServer.tool(
      'get_application_history',
      'Show deployment history, newest first, with short revisions and who initiated each deploy.',
      HistoryArgsSchema.shape,
      async (args, extra) => handlers.getApplicationHistory(args, extra.signal)
    );

    this.mcpServer.tool(
      'get_resource',
      'Get the live manifest of one managed resource with a status line.',
      ResourceArgsSchema.shape,
      async (args, extra) => handlers.getResource(args, extra.signal)
    );

    // ========================================================================
    // Writes
    // ========================================================================

    this.mcpServer.tool(
      'sync_application',
      'Sync an application to its target revision. Supports dry run, prune, force, selected resources and retry.',
      SyncArgsSchema.shape,
      async (args, extra) => handlers.syncApplication(args, extra.signal)
    );

    this.mcpServer.tool(
      'rollback_application',
      'Roll an application back to a deployment history id.',
      RollbackArgsSchema.shape,
      async (args, extra) => handlers.rollbackApplication(args, extra.signal)
    );

    this.mcpServer.tool(
      'patch_resource',
      'Patch one managed resource with a merge, JSON or strategic merge patch.',
      PatchResourceArgsSchema.shape,
      async (args, extra) => handlers.patchResource(args, extra.signal)
    );
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Create and start the MCP server
 */
export async function startMCPServer(
  config: BridgeConfig,
  options: ServerOptions = {}
): Promise<Result<ArgoCDMCPServer, ArgoCDError>> {
  const server = ArgoCDMCPServer.create(config, options);
  if (!server.success) return server;
  await server.data.start();
  return server;
}
