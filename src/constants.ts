/**
 * @module constants
 * @description Central constants file for display caps, defaults and fixed texts
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Display Caps
// ============================================================================

/**
 * Maximum items shown in each summary. Aggregate counts always cover the
 * full input; these only bound what is listed.
 */
export const DISPLAY_LIMITS = {
  /** Log entries listed in a pod logs summary */
  LOG_ENTRIES: 20,
  /** Event details listed in an events summary */
  EVENTS: 20,
  /** Distinct reasons listed in the events report */
  EVENT_REASONS: 10,
  /** Nodes sampled from a resource tree */
  TREE_SAMPLE: 10,
  /** History entries listed */
  HISTORY_ENTRIES: 20,
  /** Characters of a short revision */
  SHORT_REVISION_CHARS: 8,
  /** Characters of a resource manifest kept before truncation */
  MANIFEST_CHARS: 10_000,
  /** Characters of an upstream error body echoed back */
  ERROR_BODY_CHARS: 500,
} as const;

// ============================================================================
// Request Defaults
// ============================================================================

/**
 * Defaults applied to upstream requests
 */
export const REQUEST_DEFAULTS = {
  /** Lines requested from the log endpoint when the caller gives none */
  TAIL_LINES: 100,
  /** Per-request timeout (30 seconds) */
  TIMEOUT_MS: 30_000,
  /** Prefix of every REST route */
  API_PREFIX: '/api/v1',
} as const;

// ============================================================================
// Fixed Texts
// ============================================================================

export const MESSAGES = {
  DIFF_MODIFIED: 'Resource has differences between live and target state',
  JSON_SEPARATOR: '\n--- JSON Data ---\n',
  REDACTED: '[REDACTED]',
  UNKNOWN: 'Unknown',
} as const;

// ============================================================================
// Environment
// ============================================================================

/**
 * Environment variable names read at startup
 */
export const ENV_VARS = {
  BASE_URL: 'ARGOCD_BASE_URL',
  ACCESS_TOKEN: 'ARGOCD_ACCESS_TOKEN',
  READ_ONLY: 'ARGOCD_READ_ONLY',
  INSECURE: 'ARGOCD_INSECURE',
  TIMEOUT_MS: 'ARGOCD_TIMEOUT_MS',
  VERBOSE: 'ARGOCD_MCP_VERBOSE',
} as const;

// ============================================================================
// Server Identity
// ============================================================================

export const SERVER_INFO = {
  NAME: 'argocd-mcp-bridge',
  VERSION: '0.1.0',
  CLI_NAME: 'argocd-mcp',
} as const;
