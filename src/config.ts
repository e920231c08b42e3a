/**
 * @module config
 * @description Loads the immutable bridge configuration from environment variables
 * @status COMPLETE
 * @dependencies zod, src/constants.ts
 * @lastModified 2026-10-19
 */

import { z } from 'zod';

import { ENV_VARS, REQUEST_DEFAULTS } from './constants.js';
import { ok, err, argoError, type Result, type ArgoCDError } from './types/common.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface BridgeConfig {
  /** Argo CD server URL without a trailing slash */
  readonly baseUrl: string;
  /** Bearer token for every request */
  readonly accessToken: string;
  /** Block sync, rollback and patch */
  readonly readOnly: boolean;
  /** Skip TLS certificate verification */
  readonly insecure: boolean;
  readonly timeoutMs: number;
  readonly verbose: boolean;
}

// ============================================================================
// Environment Schema
// ============================================================================

/** Only the exact string "true" switches a flag on */
const FlagSchema = z
  .string()
  .optional()
  .transform((value) => value === 'true');

const EnvSchema = z.object({
  [ENV_VARS.BASE_URL]: z
    .string({ required_error: `${ENV_VARS.BASE_URL} must be set` })
    .trim()
    .min(1, `${ENV_VARS.BASE_URL} must not be empty`)
    .url(`${ENV_VARS.BASE_URL} must be a valid URL`),
  [ENV_VARS.ACCESS_TOKEN]: z
    .string({ required_error: `${ENV_VARS.ACCESS_TOKEN} must be set` })
    .trim()
    .min(1, `${ENV_VARS.ACCESS_TOKEN} must not be empty`),
  [ENV_VARS.READ_ONLY]: FlagSchema,
  [ENV_VARS.INSECURE]: FlagSchema,
  [ENV_VARS.VERBOSE]: FlagSchema,
  [ENV_VARS.TIMEOUT_MS]: z
    .string()
    .regex(/^\d+$/, `${ENV_VARS.TIMEOUT_MS} must be a positive integer`)
    .transform(Number)
    .refine((ms) => ms > 0, `${ENV_VARS.TIMEOUT_MS} must be a positive integer`)
    .optional(),
});

// ============================================================================
// Loading
// ============================================================================

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

/**
 * Build the configuration from an environment map. Validation messages
 * name the variable, never its value.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<Pick<BridgeConfig, 'verbose'>> = {}
): Result<BridgeConfig, ArgoCDError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => issue.message);
    return err(argoError('Configuration', messages.join('; '), { context: { variables: parsed.error.issues.map((i) => i.path.join('.')) } }));
  }

  const values = parsed.data;
  return ok(
    Object.freeze({
      baseUrl: normalizeBaseUrl(values[ENV_VARS.BASE_URL]),
      accessToken: values[ENV_VARS.ACCESS_TOKEN],
      readOnly: values[ENV_VARS.READ_ONLY],
      insecure: values[ENV_VARS.INSECURE],
      timeoutMs: values[ENV_VARS.TIMEOUT_MS] ?? REQUEST_DEFAULTS.TIMEOUT_MS,
      verbose: overrides.verbose ?? values[ENV_VARS.VERBOSE],
    })
  );
}
