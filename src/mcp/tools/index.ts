/**
 * @module mcp/tools
 * @description MCP tool names, argument schemas and handlers
 * @status COMPLETE
 * @dependencies zod, src/gate
 * @lastModified 2026-10-19
 *
 * Note: Tool registrations are handled in src/mcp/server.ts using the
 * McpServer.tool() API; this module only supplies the pieces.
 */

import { WRITE_OPERATIONS } from '../../gate/mutation-gate.js';

/**
 * Tool categories for documentation
 */
export const TOOL_CATEGORIES = {
  APPLICATIONS: [
    'list_applications',
    'list_application_names',
    'get_application',
    'get_manifests',
    'revision_metadata',
    'get_sync_windows',
    'refresh_application',
  ],
  DIAGNOSTICS: [
    'resource_tree',
    'server_side_diff',
    'list_resource_events',
    'pod_logs',
    'get_application_history',
    'get_resource',
  ],
  WRITE: WRITE_OPERATIONS,
} as const;

/**
 * All available tool names
 */
export const ALL_TOOL_NAMES = [
  ...TOOL_CATEGORIES.APPLICATIONS,
  ...TOOL_CATEGORIES.DIAGNOSTICS,
  ...TOOL_CATEGORIES.WRITE,
] as const;

export type ToolName = typeof ALL_TOOL_NAMES[number];

export { ToolHandlers, type ToolDependencies } from './handlers.js';
export { toolSuccess, toolJSON, toolReport, toolError, type ToolResult, type TextContent } from './results.js';
export * from './schemas.js';
