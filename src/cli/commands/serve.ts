/**
 * @module cli/commands/serve
 * @description Serve command - run the MCP server over stdio
 * @status COMPLETE
 * @dependencies commander, src/mcp
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';

import { runServer } from '../../mcp/index.js';

interface ServeOptions {
  verbose: boolean;
}

export const serveCommand = new Command('serve')
  .description('Start the MCP server on stdio (configured through ARGOCD_* environment variables)')
  .option('-v, --verbose', 'Log requests and lifecycle events to stderr', false)
  .action(async (options: ServeOptions) => {
    const code = await runServer({ verbose: options.verbose });
    if (code !== undefined) process.exit(code);
  });
