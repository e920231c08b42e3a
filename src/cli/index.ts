#!/usr/bin/env node
/**
 * @module cli/index
 * @description CLI entry point: the MCP server and offline summaries
 * @status COMPLETE
 * @dependencies commander
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';

import { SERVER_INFO } from '../constants.js';
import { serveCommand, summarizeCommand } from './commands/index.js';

// ============================================================================
// Program Definition
// ============================================================================

const program = new Command();

program
  .name(SERVER_INFO.CLI_NAME)
  .description('Argo CD bridge for AI assistants - MCP server and payload summaries')
  .version(SERVER_INFO.VERSION);

// ============================================================================
// Register Commands
// ============================================================================

program.addCommand(serveCommand);
program.addCommand(summarizeCommand);

// ============================================================================
// Default Action (no command)
// ============================================================================

program.action(() => {
  console.log(`
Usage: ${SERVER_INFO.CLI_NAME} <command> [options]

Commands:
  serve                     Start the MCP server on stdio
  summarize <kind> <file>   Summarize a captured payload (logs, events, tree, diff, history)

Environment:
  ARGOCD_BASE_URL           Argo CD server URL (required)
  ARGOCD_ACCESS_TOKEN       API token (required)
  ARGOCD_READ_ONLY=true     Block sync, rollback and patch
  ARGOCD_INSECURE=true      Skip TLS certificate verification
  ARGOCD_TIMEOUT_MS         Request timeout (default 30000)
  ARGOCD_MCP_VERBOSE=true   Verbose logging to stderr

Examples:
  ${SERVER_INFO.CLI_NAME} serve --verbose
  ${SERVER_INFO.CLI_NAME} summarize logs pod.ndjson --errors-only --name checkout
  ${SERVER_INFO.CLI_NAME} summarize history app.json --format json

Run '${SERVER_INFO.CLI_NAME} <command> --help' for more information on a command.
`);
});

// ============================================================================
// Parse Arguments
// ============================================================================

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
