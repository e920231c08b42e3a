/**
 * @module client/errors
 * @description Maps upstream failures onto the ArgoCDError taxonomy
 * @status COMPLETE
 * @dependencies src/types/common.ts, src/constants.ts
 * @lastModified 2026-10-19
 */

import { argoError, type ArgoCDError, type ArgoCDErrorCode } from '../types/common.js';
import { DISPLAY_LIMITS, MESSAGES } from '../constants.js';

// ============================================================================
// Status Mapping
// ============================================================================

/**
 * Error code for a non-2xx upstream status
 */
export function codeForStatus(status: number): ArgoCDErrorCode {
  switch (status) {
    case 401:
      return 'Authentication';
    case 403:
      return 'Authorization';
    case 404:
      return 'NotFound';
    case 409:
      return 'Conflict';
    default:
      return status >= 500 ? 'ServerError' : 'BadRequest';
  }
}

/**
 * Pull a readable message out of an error body. The API answers with
 * `{ error, message, code }`; anything else is echoed as trimmed text.
 */
export function extractUpstreamMessage(body: string): string {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return 'empty response body';
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null) {
      const message = 'message' in parsed ? parsed.message : undefined;
      if (typeof message === 'string' && message.length > 0) return message;
      const error = 'error' in parsed ? parsed.error : undefined;
      if (typeof error === 'string' && error.length > 0) return error;
    }
  } catch {
    // not JSON; fall through to raw text
  }

  return trimmed.length > DISPLAY_LIMITS.ERROR_BODY_CHARS
    ? `${trimmed.slice(0, DISPLAY_LIMITS.ERROR_BODY_CHARS)}...`
    : trimmed;
}

// ============================================================================
// Redaction
// ============================================================================

/**
 * Replace every occurrence of each secret with a placeholder
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  let result = text;
  for (const secret of secrets) {
    if (secret.length > 0) {
      result = result.split(secret).join(MESSAGES.REDACTED);
    }
  }
  return result;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Error for a non-2xx response
 */
export function upstreamError(status: number, body: string, secrets: readonly string[] = []): ArgoCDError {
  const message = redactSecrets(extractUpstreamMessage(body), secrets);
  return argoError(codeForStatus(status), `ArgoCD API error (${status}): ${message}`, { status });
}

export function networkError(message: string, cause?: unknown, secrets: readonly string[] = []): ArgoCDError {
  return argoError('NetworkError', redactSecrets(message, secrets), {
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function parseError(message: string, context?: Record<string, unknown>): ArgoCDError {
  return argoError('ParseError', message, { context });
}

export function readOnlyViolation(operation: string): ArgoCDError {
  return argoError(
    'ReadOnlyModeViolation',
    `Operation '${operation}' is blocked: the server is running in read-only mode (ARGOCD_READ_ONLY=true)`,
    { context: { operation } }
  );
}

/**
 * One-line rendering used in tool and CLI output
 */
export function formatError(error: ArgoCDError): string {
  return `${error.code}: ${error.message}`;
}
