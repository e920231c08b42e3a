/**
 * @module mcp/server.test
 * @description Unit tests for the MCP server - tool registration, handlers and the read-only gate
 * @status COMPLETE
 * @dependencies src/mcp/server.ts, @modelcontextprotocol/sdk
 * @lastModified 2026-10-19
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Response } from 'undici';

import type { BridgeConfig } from '../config.js';
import type { FetchFn } from '../client/argocd-client.js';
import { silentLogger } from '../logger.js';
import { ApplicationSchema } from '../types/argocd.js';
import { ALL_TOOL_NAMES } from './tools/index.js';
import { ArgoCDMCPServer, buildInstructions } from './server.js';

const CONFIG: BridgeConfig = {
  baseUrl: 'https://argocd.example.com',
  accessToken: 'test-secret',
  readOnly: false,
  insecure: false,
  timeoutMs: 5_000,
  verbose: false,
};

const BLOCKED = (operation: string): string =>
  `Error: Operation '${operation}' is blocked: the server is running in read-only mode (ARGOCD_READ_ONLY=true)`;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function createServer(fetchMock: FetchFn, overrides: Partial<BridgeConfig> = {}): ArgoCDMCPServer {
  const result = ArgoCDMCPServer.create({ ...CONFIG, ...overrides }, { fetch: fetchMock, logger: silentLogger });
  if (!result.success) throw new Error(result.error.message);
  return result.data;
}

describe('MCP Server', () => {
  let fetchMock: Mock<FetchFn>;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
  });

  // ============================================================================
  // Instructions
  // ============================================================================

  describe('buildInstructions', () => {
    it('mentions the read-only mode only when the gate is closed', () => {
      const open = buildInstructions(false);
      const closed = buildInstructions(true);

      expect(open.split('\n')).toHaveLength(3);
      expect(closed.split('\n').at(-1)).toBe(
        'READ-ONLY MODE: sync_application, rollback_application and patch_resource are blocked (ARGOCD_READ_ONLY=true).'
      );
    });
  });

  describe('Server State', () => {
    it('builds a closed gate for read-only configs', () => {
      const server = createServer(fetchMock, { readOnly: true });

      expect(server.getState().gate.state).toBe('closed');
      expect(server.getState().client.baseUrl).toBe('https://argocd.example.com');
    });

    it('rejects a config without a token', () => {
      const result = ArgoCDMCPServer.create({ ...CONFIG, accessToken: '' }, { logger: silentLogger });

      expect(result.success).toBe(false);
    });
  });

  // ============================================================================
  // Read-only Gate
  // ============================================================================

  describe('Read-only mode', () => {
    it('blocks every write before any request is sent', async () => {
      const handlers = createServer(fetchMock, { readOnly: true }).getHandlers();

      const sync = await handlers.syncApplication({ applicationName: 'web', dryRun: true });
      const rollback = await handlers.rollbackApplication({ applicationName: 'web', id: 2 });
      const patch = await handlers.patchResource({
        applicationName: 'web',
        resourceName: 'web',
        kind: 'Deployment',
        version: 'v1',
        patch: '{"spec":{"replicas":0}}',
      });

      expect(sync).toEqual({ content: [{ type: 'text', text: BLOCKED('sync_application') }], isError: true });
      expect(rollback).toEqual({ content: [{ type: 'text', text: BLOCKED('rollback_application') }], isError: true });
      expect(patch).toEqual({ content: [{ type: 'text', text: BLOCKED('patch_resource') }], isError: true });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('still serves reads', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));
      const handlers = createServer(fetchMock, { readOnly: true }).getHandlers();

      const result = await handlers.listApplications({});

      expect(result).toEqual({ content: [{ type: 'text', text: 'No applications found' }] });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('lets writes through when the gate is open', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ metadata: { name: 'web' } }));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.syncApplication({ applicationName: 'web', dryRun: true });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.isError).toBeUndefined();
      expect(result.content[0]?.text.split('\n')[0]).toBe("Dry-run sync requested for application 'web'");
    });
  });

  // ============================================================================
  // Tool Handlers
  // ============================================================================

  describe('Tool handlers', () => {
    it('returns the report followed by the JSON summary', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ metadata: { name: 'web' } }, { metadata: { name: 'api' } }] }));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.listApplicationNames({});

      expect(result.content).toEqual([
        { type: 'text', text: 'Found 2 application(s):\n- api\n- web' },
        { type: 'text', text: `\n--- JSON Data ---\n${JSON.stringify(['api', 'web'], null, 2)}` },
      ]);
    });

    it('returns the raw payload with full', async () => {
      const raw = { metadata: { name: 'web', namespace: 'argocd' }, spec: { project: 'shop' } };
      fetchMock.mockResolvedValueOnce(jsonResponse(raw));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.getApplication({ applicationName: 'web', full: true });

      expect(result.content).toHaveLength(1);
      expect(JSON.parse(result.content[0]?.text ?? '')).toEqual(
        JSON.parse(JSON.stringify(ApplicationSchema.parse(raw)))
      );
    });

    it('says so when nothing was found', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ nodes: [], orphanedNodes: null }));
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));
      fetchMock.mockResolvedValueOnce(jsonResponse({ metadata: { name: 'web' }, status: {} }));
      const handlers = createServer(fetchMock).getHandlers();

      const tree = await handlers.resourceTree({ applicationName: 'web' });
      const events = await handlers.listResourceEvents({ applicationName: 'web' });
      const history = await handlers.getApplicationHistory({ applicationName: 'web' });

      expect(tree).toEqual({ content: [{ type: 'text', text: "No resources found for application 'web'" }] });
      expect(events).toEqual({ content: [{ type: 'text', text: "No events found for application 'web'" }] });
      expect(history).toEqual({
        content: [{ type: 'text', text: "No deployment history found for application 'web'" }],
      });
    });

    it('names the pod when no logs came back', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.podLogs({ applicationName: 'web', podName: 'web-1' });

      expect(result).toEqual({ content: [{ type: 'text', text: "No logs found for application 'web' pod 'web-1'" }] });
    });

    it('turns upstream failures into error results', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'application not found' }, 404));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.getApplication({ applicationName: 'missing' });

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Error: ArgoCD API error (404): application not found' }],
        isError: true,
      });
    });

    it('reads the application twice to refresh it', async () => {
      const app = (revision: string) => ({
        metadata: { name: 'web' },
        status: { sync: { status: 'Synced', revision }, health: { status: 'Healthy' } },
      });
      fetchMock.mockResolvedValueOnce(jsonResponse(app('aaaa')));
      fetchMock.mockResolvedValueOnce(jsonResponse(app('bbbb')));
      const handlers = createServer(fetchMock).getHandlers();

      const result = await handlers.refreshApplication({ applicationName: 'web' });

      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        'https://argocd.example.com/api/v1/applications/web',
        'https://argocd.example.com/api/v1/applications/web?refresh=normal',
      ]);
      expect(result.content[0]?.text).toBe(
        [
          "Refreshed application 'web' (normal)",
          'Sync status: Synced (unchanged)',
          'Health status: Healthy (unchanged)',
          'Revision: aaaa -> bbbb',
        ].join('\n')
      );
    });
  });

  // ============================================================================
  // MCP Protocol
  // ============================================================================

  describe('MCP protocol', () => {
    let client: Client;
    let server: ArgoCDMCPServer;

    beforeEach(async () => {
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      const created = ArgoCDMCPServer.create(
        { ...CONFIG, readOnly: true },
        { fetch: fetchMock, logger: silentLogger, transport: serverTransport }
      );
      if (!created.success) throw new Error(created.error.message);
      server = created.data;
      await server.start();
      client = new Client({ name: 'test-client', version: '1.0.0' });
      await client.connect(clientTransport);
    });

    afterEach(async () => {
      await client.close();
      await server.stop();
    });

    it('registers every tool', async () => {
      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name).sort()).toEqual([...ALL_TOOL_NAMES].sort());
    });

    it('refuses a write over the protocol without calling Argo CD', async () => {
      const result = await client.callTool({ name: 'rollback_application', arguments: { applicationName: 'web', id: 1 } });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: BLOCKED('rollback_application') }],
        isError: true,
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
