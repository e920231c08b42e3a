#!/usr/bin/env node
/**
 * @module mcp/index
 * @description MCP (Model Context Protocol) server for AI assistants
 * @status COMPLETE
 * @dependencies src/config.ts, src/mcp/server.ts
 * @lastModified 2026-10-19
 */

import { pathToFileURL } from 'node:url';

import { loadConfig } from '../config.js';
import { formatError } from '../client/errors.js';
import { createLogger } from '../logger.js';
import { startMCPServer } from './server.js';

// ============================================================================
// Server Exports
// ============================================================================

export {
  ArgoCDMCPServer,
  startMCPServer,
  buildInstructions,
  type ServerState,
  type ServerOptions,
} from './server.js';

// ============================================================================
// Tool Exports
// ============================================================================

export {
  TOOL_CATEGORIES,
  ALL_TOOL_NAMES,
  ToolHandlers,
  toolSuccess,
  toolJSON,
  toolReport,
  toolError,
  type ToolName,
  type ToolResult,
} from './tools/index.js';

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Load the configuration from the environment and serve over stdio until
 * SIGINT or SIGTERM. Returns the process exit code on startup failure.
 */
export async function runServer(options: { verbose?: boolean } = {}): Promise<number | undefined> {
  const config = loadConfig(process.env, options.verbose ? { verbose: true } : {});
  if (!config.success) {
    console.error(`Failed to start MCP server: ${formatError(config.error)}`);
    return 1;
  }

  const logger = createLogger({ verbose: config.data.verbose });
  const server = await startMCPServer(config.data, { logger });
  if (!server.success) {
    logger.error(`Failed to start MCP server: ${formatError(server.error)}`);
    return 1;
  }

  const shutdown = (): void => {
    logger.info('MCP Server shutting down...');
    server.data.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return undefined;
}

async function main(): Promise<void> {
  const verbose = process.argv.includes('--verbose') || process.argv.includes('-v');
  const code = await runServer({ verbose });
  if (code !== undefined) process.exit(code);
}

// Run if executed directly
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  });
}
