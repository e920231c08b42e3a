/**
 * @module client/argocd-client.test
 * @description Unit tests for the Argo CD REST client against a stubbed fetch
 * @status COMPLETE
 * @dependencies src/client/argocd-client.ts, undici
 * @lastModified 2026-10-19
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { Response, type RequestInit } from 'undici';
import { ArgoCDClient, applicationPath, buildQuery, type FetchFn } from './argocd-client.js';

const BASE_URL = 'https://argocd.example.com';
const TOKEN = 'test-secret';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/** A fetch that never answers until its signal aborts */
function hangingFetch(url: string, init: RequestInit): Promise<Response> {
  return new Promise((_, reject) => {
    if (init.signal?.aborted) {
      reject(abortError());
      return;
    }
    init.signal?.addEventListener('abort', () => reject(abortError()));
  });
}

describe('ArgoCDClient', () => {
  let fetchMock: Mock<FetchFn>;
  let client: ArgoCDClient;

  function callAt(index = 0): [string, RequestInit] {
    const call = fetchMock.mock.calls[index];
    if (!call) throw new Error(`fetch call ${index} was not made`);
    return call;
  }

  function createClient(overrides: { timeoutMs?: number } = {}): ArgoCDClient {
    const result = ArgoCDClient.create({ baseUrl: `${BASE_URL}/`, accessToken: TOKEN, fetch: fetchMock, ...overrides });
    if (!result.success) throw new Error(result.error.message);
    return result.data;
  }

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    client = createClient();
  });

  // ==========================================================================
  // Construction
  // ==========================================================================

  describe('create', () => {
    it('rejects an empty base URL or token', () => {
      const noUrl = ArgoCDClient.create({ baseUrl: ' ', accessToken: TOKEN });
      const noToken = ArgoCDClient.create({ baseUrl: BASE_URL, accessToken: '' });

      expect(noUrl.success).toBe(false);
      expect(noToken.success).toBe(false);
      if (!noToken.success) {
        expect(noToken.error).toEqual({ code: 'Configuration', message: 'Access token cannot be empty' });
      }
    });

    it('trims the trailing slash of the base URL', () => {
      expect(client.baseUrl).toBe(BASE_URL);
    });
  });

  // ==========================================================================
  // Helpers
  // ==========================================================================

  describe('buildQuery', () => {
    it('repeats array keys and skips undefined values', () => {
      expect(buildQuery({ projects: ['a', 'b'], selector: undefined, follow: false })).toBe(
        '?projects=a&projects=b&follow=false'
      );
      expect(buildQuery({ name: undefined })).toBe('');
    });
  });

  describe('applicationPath', () => {
    it('encodes the name as one path segment', () => {
      expect(applicationPath('team/web', '/resource-tree')).toBe('/api/v1/applications/team%2Fweb/resource-tree');
    });
  });

  // ==========================================================================
  // Requests
  // ==========================================================================

  describe('reads', () => {
    it('sends the bearer token and filters', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ metadata: { name: 'web' } }] }));

      const result = await client.listApplications({ projects: ['shop', 'ops'], selector: 'team=payments' });

      expect(result.success && result.data.items.map((item) => item.metadata?.name)).toEqual(['web']);
      const [url, init] = callAt();
      expect(url).toBe(`${BASE_URL}/api/v1/applications?projects=shop&projects=ops&selector=team%3Dpayments`);
      expect(init.method).toBe('GET');
      expect(init.headers).toEqual({ Authorization: `Bearer ${TOKEN}`, Accept: 'application/json' });
      expect(init.body).toBeUndefined();
    });

    it('treats a null item list as empty', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: null }));

      const result = await client.listApplications();

      expect(result).toEqual({ success: true, data: { items: [] } });
    });

    it('maps the tree filter to the name parameter', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ nodes: [] }));

      await client.getResourceTree({ name: 'web', resourceName: 'web-1', kind: 'Pod', appNamespace: 'argocd' });

      expect(callAt()[0]).toBe(`${BASE_URL}/api/v1/applications/web/resource-tree?name=web-1&kind=Pod&appNamespace=argocd`);
    });

    it('unwraps the event list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ reason: 'BackOff' }] }));

      const result = await client.listResourceEvents({ name: 'web' });

      expect(result).toEqual({ success: true, data: [{ reason: 'BackOff' }] });
    });

    it('requests a finite log window and parses the stream', async () => {
      fetchMock.mockResolvedValueOnce(
        textResponse('{"result":{"content":"ERROR boom","podName":"web-1"}}\n{"result":{"content":"","last":true}}\n')
      );

      const result = await client.podLogs({ name: 'web', podName: 'web-1', container: 'app' });

      expect(callAt()[0]).toBe(
        `${BASE_URL}/api/v1/applications/web/logs?podName=web-1&container=app&tailLines=100&follow=false`
      );
      expect(result).toEqual({
        success: true,
        data: [{ content: 'ERROR boom', podName: 'web-1', container: 'app' }],
      });
    });

    it('encodes the revision in the metadata path', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ author: 'alice', tags: null }));

      const result = await client.revisionMetadata({ name: 'web', revision: 'release/1.4' });

      expect(callAt()[0]).toBe(`${BASE_URL}/api/v1/applications/web/revisions/release%2F1.4/metadata`);
      expect(result).toEqual({ success: true, data: { author: 'alice', tags: [] } });
    });
  });

  describe('writes', () => {
    it('posts the sync request body', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ metadata: { name: 'web' } }));

      await client.syncApplication({
        name: 'web',
        dryRun: true,
        force: true,
        resources: [{ kind: 'Deployment', name: 'web' }],
        syncOptions: ['Validate=false'],
        retry: { limit: 2, backoff: { duration: '5s' } },
      });

      const [url, init] = callAt();
      expect(url).toBe(`${BASE_URL}/api/v1/applications/web/sync`);
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        Authorization: `Bearer ${TOKEN}`,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(init.body))).toEqual({
        name: 'web',
        dryRun: true,
        prune: false,
        strategy: { apply: { force: true } },
        resources: [{ kind: 'Deployment', name: 'web' }],
        syncOptions: { items: ['Validate=false'] },
        retryStrategy: { limit: 2, backoff: { duration: '5s' } },
      });
    });

    it('posts the rollback id', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await client.rollbackApplication({ name: 'web', id: 3, prune: true });

      expect(JSON.parse(String(callAt()[1].body))).toEqual({ name: 'web', id: 3, dryRun: false, prune: true });
    });

    it('sends the patch as a JSON string with the merge patch type by default', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ manifest: '{}' }));

      await client.patchResource({
        name: 'web',
        resourceName: 'web',
        kind: 'Deployment',
        version: 'v1',
        group: 'apps',
        namespace: 'shop',
        patch: '{"spec":{"replicas":2}}',
      });

      const [url, init] = callAt();
      expect(url).toBe(
        `${BASE_URL}/api/v1/applications/web/resource?namespace=shop&resourceName=web&version=v1&group=apps&kind=Deployment&patchType=application%2Fmerge-patch%2Bjson`
      );
      expect(init.body).toBe('"{\\"spec\\":{\\"replicas\\":2}}"');
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('failures', () => {
    it('maps upstream statuses to error codes', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'application not found', code: 5 }, 404));

      const result = await client.getApplication({ name: 'missing' });

      expect(result).toEqual({
        success: false,
        error: { code: 'NotFound', status: 404, message: 'ArgoCD API error (404): application not found' },
      });
    });

    it('never echoes the token', async () => {
      fetchMock.mockResolvedValueOnce(textResponse(`invalid session: ${TOKEN}`, 401));

      const result = await client.getApplication({ name: 'web' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('Authentication');
        expect(result.error.message).toBe('ArgoCD API error (401): invalid session: [REDACTED]');
      }
    });

    it('reports bodies that are not JSON', async () => {
      fetchMock.mockResolvedValueOnce(textResponse('<html>proxy</html>'));

      const result = await client.listApplications();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('ParseError');
        expect(result.error.message).toBe('Response from /api/v1/applications is not valid JSON');
      }
    });

    it('reports payloads of the wrong shape', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: 'nope' }));

      const result = await client.listApplications();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          'Unexpected response shape from /api/v1/applications at items: Expected array, received string'
        );
      }
    });

    it('turns transport failures into network errors', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await client.listApplications();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NetworkError');
        expect(result.error.message).toBe('Request to /api/v1/applications failed: fetch failed');
      }
    });

    it('times out slow requests', async () => {
      fetchMock.mockImplementation(hangingFetch);
      const slow = createClient({ timeoutMs: 10 });

      const result = await slow.listApplications();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NetworkError');
        expect(result.error.message).toBe('Request to /api/v1/applications timed out after 10ms');
      }
    });

    it('stops when the caller cancels', async () => {
      fetchMock.mockImplementation(hangingFetch);
      const controller = new AbortController();
      controller.abort();

      const result = await client.listApplications({}, { signal: controller.signal });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Request to /api/v1/applications was cancelled');
      }
    });
  });
});
