/**
 * @module mcp/tools/results
 * @description Tool result helpers
 * @status COMPLETE
 * @dependencies src/constants.ts
 * @lastModified 2026-10-19
 */

import { MESSAGES } from '../../constants.js';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolResult {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

/**
 * Create a successful text result
 */
export function toolSuccess(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

/**
 * Create a JSON result
 */
export function toolJSON(data: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Create a report result: the rendered text, then the structured summary
 */
export function toolReport(text: string, data: unknown): ToolResult {
  return {
    content: [
      { type: 'text', text },
      { type: 'text', text: `${MESSAGES.JSON_SEPARATOR}${JSON.stringify(data, null, 2)}` },
    ],
  };
}

/**
 * Create an error result
 */
export function toolError(message: string): ToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}
