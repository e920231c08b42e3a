/**
 * @module analyzer/log-analyzer
 * @description Parses the NDJSON log stream and reduces a log window to a capped summary
 * @status COMPLETE
 * @dependencies src/analyzer/log-classifier.ts, src/types
 * @lastModified 2026-10-19
 */

import { LogEntrySchema, StreamErrorSchema } from '../types/argocd.js';
import type { AnalyzedLogEntry, LogLevel, PodLogsSummary, RawLogLine } from '../types/summaries.js';
import { ok, err, type Result, type ArgoCDError } from '../types/common.js';
import { DISPLAY_LIMITS, REQUEST_DEFAULTS } from '../constants.js';
import { parseError, upstreamError } from '../client/errors.js';
import { classifyLogLevel, isPotentialIssue } from './log-classifier.js';

// ============================================================================
// Stream Parsing
// ============================================================================

export interface LogStreamContext {
  /** Container the stream was requested for; the records do not carry it */
  container?: string;
}

/**
 * Parse a log stream body. Each non-blank line is either
 * `{"result": LogEntry}`, a bare LogEntry, or an `{"error": ...}` frame.
 *
 * The closing `last` marker with no content is dropped. A line that is not
 * a JSON object of that shape fails the whole parse.
 */
export function parseLogStream(
  body: string,
  context: LogStreamContext = {}
): Result<RawLogLine[], ArgoCDError> {
  const lines: RawLogLine[] = [];
  const rawLines = body.split('\n');

  for (let i = 0; i < rawLines.length; i++) {
    const text = rawLines[i]?.trim() ?? '';
    if (text.length === 0) continue;

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      return err(parseError(`Log stream line ${i + 1} is not valid JSON`, { lineNumber: i + 1 }));
    }

    const streamError = StreamErrorSchema.safeParse(value);
    if (streamError.success) {
      const { http_code: status, message } = streamError.data.error;
      return err(upstreamError(status ?? 500, JSON.stringify({ message: message ?? '' })));
    }

    const record =
      typeof value === 'object' && value !== null && 'result' in value ? value.result : value;
    const entry = LogEntrySchema.safeParse(record);
    if (!entry.success) {
      return err(parseError(`Log stream line ${i + 1} is not a log entry`, { lineNumber: i + 1 }));
    }

    const { content, timeStampStr, timeStamp, podName, last } = entry.data;
    if (last === true && !content) continue;

    const line: RawLogLine = { content: content ?? '' };
    const timestamp = timeStampStr || timeStamp;
    if (timestamp) line.timestamp = timestamp;
    if (podName) line.podName = podName;
    if (context.container) line.container = context.container;
    lines.push(line);
  }

  return ok(lines);
}

// ============================================================================
// Analysis
// ============================================================================

export interface AnalyzeOptions {
  /** Window size; only the last `tailLines` lines are considered */
  tailLines?: number;
  /** Restrict the displayed entries to potential issues */
  errorsOnly?: boolean;
  podName?: string;
  container?: string;
}

function emptyLevelCounts(): Record<LogLevel, number> {
  return { FATAL: 0, ERROR: 0, WARNING: 0, INFO: 0, DEBUG: 0, UNKNOWN: 0 };
}

export function analyzeLogLine(line: RawLogLine): AnalyzedLogEntry {
  const level = classifyLogLevel(line.content);
  const entry: AnalyzedLogEntry = {
    content: line.content,
    level,
    isError: level === 'ERROR' || level === 'FATAL',
    isWarning: level === 'WARNING',
    potentialIssue: isPotentialIssue(line.content, level),
  };
  if (line.timestamp !== undefined) entry.timestamp = line.timestamp;
  if (line.podName !== undefined) entry.podName = line.podName;
  return entry;
}

/**
 * Summarize a log window.
 *
 * Counts cover every line in the window. `errorsOnly` narrows the listed
 * entries only, and the list keeps the most recent
 * {@link DISPLAY_LIMITS.LOG_ENTRIES} matches in chronological order.
 */
export function analyzePodLogs(lines: readonly RawLogLine[], options: AnalyzeOptions = {}): PodLogsSummary {
  const tailLines = options.tailLines ?? REQUEST_DEFAULTS.TAIL_LINES;
  const errorsOnly = options.errorsOnly ?? false;
  const window = tailLines > 0 ? lines.slice(-tailLines) : [];

  const logsByLevel = emptyLevelCounts();
  let errorCount = 0;
  let warningCount = 0;
  let potentialIssueCount = 0;
  const matching: AnalyzedLogEntry[] = [];

  for (const line of window) {
    const entry = analyzeLogLine(line);
    logsByLevel[entry.level]++;
    if (entry.isError) errorCount++;
    if (entry.isWarning) warningCount++;
    if (entry.potentialIssue) potentialIssueCount++;
    if (!errorsOnly || entry.potentialIssue) matching.push(entry);
  }

  const summary: PodLogsSummary = {
    totalLines: window.length,
    errorCount,
    warningCount,
    potentialIssueCount,
    logsByLevel,
    matchingCount: matching.length,
    filtered: errorsOnly,
    tailLines,
    logEntries: matching.slice(-DISPLAY_LIMITS.LOG_ENTRIES),
  };
  if (options.podName !== undefined) summary.podName = options.podName;
  if (options.container !== undefined) summary.container = options.container;
  return summary;
}
