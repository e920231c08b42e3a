/**
 * @module config.test
 * @description Unit tests for environment configuration loading
 * @status COMPLETE
 * @dependencies src/config.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, normalizeBaseUrl } from './config.js';

const BASE_ENV = {
  ARGOCD_BASE_URL: 'https://argocd.example.com/',
  ARGOCD_ACCESS_TOKEN: 'test-secret',
};

describe('config', () => {
  it('loads defaults from a minimal environment', () => {
    const result = loadConfig(BASE_ENV);

    expect(result).toEqual({
      success: true,
      data: {
        baseUrl: 'https://argocd.example.com',
        accessToken: 'test-secret',
        readOnly: false,
        insecure: false,
        timeoutMs: 30000,
        verbose: false,
      },
    });
    expect(result.success && Object.isFrozen(result.data)).toBe(true);
  });

  it('enables flags only for the exact string "true"', () => {
    const on = loadConfig({ ...BASE_ENV, ARGOCD_READ_ONLY: 'true', ARGOCD_INSECURE: 'true', ARGOCD_MCP_VERBOSE: 'true' });
    expect(on.success && [on.data.readOnly, on.data.insecure, on.data.verbose]).toEqual([true, true, true]);

    for (const value of ['True', 'TRUE', '1', 'yes', '']) {
      const off = loadConfig({ ...BASE_ENV, ARGOCD_READ_ONLY: value });
      expect(off.success && off.data.readOnly).toBe(false);
    }
  });

  it('reads the timeout', () => {
    const result = loadConfig({ ...BASE_ENV, ARGOCD_TIMEOUT_MS: '5000' });

    expect(result.success && result.data.timeoutMs).toBe(5000);
  });

  it('rejects a timeout that is not a positive integer', () => {
    const zero = loadConfig({ ...BASE_ENV, ARGOCD_TIMEOUT_MS: '0' });
    expect(zero.success).toBe(false);
    if (!zero.success) {
      expect(zero.error.code).toBe('Configuration');
      expect(zero.error.message).toBe('ARGOCD_TIMEOUT_MS must be a positive integer');
    }

    const text = loadConfig({ ...BASE_ENV, ARGOCD_TIMEOUT_MS: 'soon' });
    expect(text.success).toBe(false);
    if (!text.success) {
      expect(text.error.message).toContain('ARGOCD_TIMEOUT_MS must be a positive integer');
    }
  });

  it('names every missing variable', () => {
    const result = loadConfig({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('ARGOCD_BASE_URL must be set; ARGOCD_ACCESS_TOKEN must be set');
    }
  });

  it('rejects an invalid URL without echoing the token', () => {
    const result = loadConfig({ ARGOCD_BASE_URL: 'not-a-url', ARGOCD_ACCESS_TOKEN: 'test-secret' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('ARGOCD_BASE_URL must be a valid URL');
      expect(JSON.stringify(result.error)).not.toContain('test-secret');
    }
  });

  it('lets the caller force verbose logging', () => {
    const result = loadConfig(BASE_ENV, { verbose: true });

    expect(result.success && result.data.verbose).toBe(true);
  });

  it('strips trailing slashes from the base URL', () => {
    expect(normalizeBaseUrl('https://argocd.example.com///')).toBe('https://argocd.example.com');
    expect(normalizeBaseUrl(' https://argocd.example.com/argo ')).toBe('https://argocd.example.com/argo');
  });
});
