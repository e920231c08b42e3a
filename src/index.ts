/**
 * @module index
 * @description Main package entry point
 * @status COMPLETE
 * @dependencies all modules
 * @lastModified 2026-10-19
 */

// Type exports
export * from './types/index.js';

// Configuration and logging
export { loadConfig, normalizeBaseUrl, type BridgeConfig } from './config.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';

// Upstream client
export {
  ArgoCDClient,
  buildQuery,
  applicationPath,
  type FetchFn,
  type ClientOptions,
  type CallOptions,
} from './client/argocd-client.js';
export { codeForStatus, formatError, redactSecrets, upstreamError } from './client/errors.js';

// Read-only policy
export {
  createMutationGate,
  checkWrite,
  isReadOnly,
  WRITE_OPERATIONS,
  type MutationGate,
  type WriteOperation,
} from './gate/mutation-gate.js';

// Summarizers and reports
export * from './analyzer/index.js';
export * from './output/formatters/index.js';

// MCP server
export { ArgoCDMCPServer, startMCPServer, type ServerOptions } from './mcp/server.js';
export { ALL_TOOL_NAMES, TOOL_CATEGORIES, type ToolName } from './mcp/tools/index.js';
