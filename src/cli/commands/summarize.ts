/**
 * @module cli/commands/summarize
 * @description Summarize command - run a summarizer over a captured Argo CD payload
 * @status COMPLETE
 * @dependencies commander, zod, src/analyzer, src/output/formatters
 * @lastModified 2026-10-19
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import {
  aggregateEvents,
  analyzePodLogs,
  formatHistory,
  parseLogStream,
  summarizeResourceTree,
  summarizeServerSideDiff,
  toResourceNodes,
} from '../../analyzer/index.js';
import { formatError, parseError } from '../../client/errors.js';
import {
  noLogsMessage,
  renderEventsReport,
  renderHistoryReport,
  renderPodLogsReport,
  renderResourceTreeReport,
  renderServerSideDiffReport,
} from '../../output/formatters/index.js';
import {
  ApplicationSchema,
  ApplicationTreeSchema,
  EventListSchema,
  KubeEventSchema,
  ResourceDiffSchema,
  RevisionHistorySchema,
  ServerSideDiffResponseSchema,
} from '../../types/argocd.js';
import { ok, err, type ArgoCDError, type Result } from '../../types/common.js';

// ============================================================================
// Types
// ============================================================================

export const PAYLOAD_KINDS = ['logs', 'events', 'tree', 'diff', 'history'] as const;
export type PayloadKind = typeof PAYLOAD_KINDS[number];

export interface SummarizeOptions {
  format: 'json' | 'text';
  errorsOnly: boolean;
  tailLines?: number;
  name?: string;
}

export interface PayloadSummary {
  text: string;
  data: unknown;
}

// ============================================================================
// Payload Shapes
// ============================================================================

/** An EventList object or a bare array of events */
const EventsPayloadSchema = z.union([
  z.array(KubeEventSchema),
  EventListSchema.transform((list) => list.items),
]);

/** A ServerSideDiffResponse object or a bare array of diff records */
const DiffPayloadSchema = z.union([
  z.array(ResourceDiffSchema),
  ServerSideDiffResponseSchema.transform((response) => response.items),
]);

/** An Application object or a bare status.history array */
const HistoryPayloadSchema = z.union([
  z.array(RevisionHistorySchema),
  ApplicationSchema.transform((app) => app.status?.history ?? []),
]);

function parseJson<S extends z.ZodTypeAny>(schema: S, content: string, kind: PayloadKind): Result<z.output<S>, ArgoCDError> {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    return err(parseError(`The ${kind} payload is not valid JSON`));
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return err(parseError(`Unexpected ${kind} payload shape${where}: ${issue?.message ?? 'invalid'}`));
  }
  return ok(parsed.data);
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Summarize one payload. `logs` takes the NDJSON log stream; the other kinds
 * take the JSON body of the matching API response.
 */
export function summarizePayload(
  kind: PayloadKind,
  content: string,
  applicationName: string,
  options: Pick<SummarizeOptions, 'errorsOnly' | 'tailLines'> = { errorsOnly: false }
): Result<PayloadSummary, ArgoCDError> {
  const none = (what: string): string => `No ${what} found for application '${applicationName}'`;

  switch (kind) {
    case 'logs': {
      const lines = parseLogStream(content);
      if (!lines.success) return lines;
      const summary = analyzePodLogs(lines.data, { tailLines: options.tailLines, errorsOnly: options.errorsOnly });
      const text = summary.totalLines === 0
        ? noLogsMessage(applicationName, summary)
        : renderPodLogsReport(applicationName, summary);
      return ok({ text, data: summary });
    }
    case 'events': {
      const events = parseJson(EventsPayloadSchema, content, kind);
      if (!events.success) return events;
      const summary = aggregateEvents(events.data);
      const text = summary.totalCount === 0 ? none('events') : renderEventsReport(applicationName, summary);
      return ok({ text, data: summary });
    }
    case 'tree': {
      const tree = parseJson(ApplicationTreeSchema, content, kind);
      if (!tree.success) return tree;
      const hosts = tree.data.hosts.flatMap((host) => (host.name ? [host.name] : []));
      const summary = summarizeResourceTree(toResourceNodes(tree.data), hosts);
      const text = summary.totalCount === 0 ? none('resources') : renderResourceTreeReport(applicationName, summary);
      return ok({ text, data: summary });
    }
    case 'diff': {
      const records = parseJson(DiffPayloadSchema, content, kind);
      if (!records.success) return records;
      const summary = summarizeServerSideDiff(records.data);
      const text = summary.totalCount === 0
        ? none('resource differences')
        : renderServerSideDiffReport(applicationName, summary);
      return ok({ text, data: summary });
    }
    case 'history': {
      const history = parseJson(HistoryPayloadSchema, content, kind);
      if (!history.success) return history;
      const summary = formatHistory(applicationName, history.data);
      const text = summary.isEmpty ? none('deployment history') : renderHistoryReport(summary);
      return ok({ text, data: summary });
    }
  }
}

function parseKind(value: string): PayloadKind {
  const kind = PAYLOAD_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${PAYLOAD_KINDS.join(', ')}`);
  }
  return kind;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}

function runSummarize(kind: PayloadKind, file: string, options: SummarizeOptions): void {
  // Resolve file path
  const filePath = path.resolve(file);

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    process.exit(1);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    console.error(`Error reading file: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const name = options.name ?? path.basename(filePath, path.extname(filePath));
  const result = summarizePayload(kind, content, name, options);
  if (!result.success) {
    console.error(`Error: ${formatError(result.error)}`);
    process.exit(1);
  }

  console.log(options.format === 'json' ? JSON.stringify(result.data.data, null, 2) : result.data.text);
}

// ============================================================================
// Command Definition
// ============================================================================

export const summarizeCommand = new Command('summarize')
  .description('Summarize a captured Argo CD payload offline')
  .argument('<kind>', `Payload kind: ${PAYLOAD_KINDS.join(', ')}`, parseKind)
  .argument('<file>', 'Path to the payload (NDJSON for logs, JSON otherwise)')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .option('-e, --errors-only', 'Logs: list only errors, warnings and potential issues', false)
  .option('-t, --tail-lines <n>', 'Logs: window size', parsePositiveInt)
  .option('-n, --name <app>', 'Application name used in the report (default: file name)')
  .action((kind: PayloadKind, file: string, options: SummarizeOptions) => {
    runSummarize(kind, file, options);
  });
