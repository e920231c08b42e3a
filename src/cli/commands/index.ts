/**
 * @module cli/commands
 * @description CLI command exports
 * @status COMPLETE
 * @dependencies commander
 * @lastModified 2026-10-19
 */

export { serveCommand } from './serve.js';
export { summarizeCommand, summarizePayload, PAYLOAD_KINDS, type PayloadKind, type PayloadSummary } from './summarize.js';
