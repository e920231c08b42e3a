/**
 * @module analyzer/log-classifier
 * @description Keyword heuristic that assigns a severity and an issue flag to a log line
 * @status COMPLETE
 * @dependencies src/types/summaries.ts
 * @lastModified 2026-10-19
 *
 * Deliberately a substring heuristic, not a log grammar. The rule table and
 * its order are the whole behavior; tests pin both.
 */

import type { LogLevel } from '../types/summaries.js';

// ============================================================================
// Rule Tables
// ============================================================================

export interface LogLevelRule {
  level: Exclude<LogLevel, 'UNKNOWN'>;
  /** Upper-case substrings; any match selects the level */
  keywords: readonly string[];
}

/**
 * Severity rules in priority order. The first rule with a matching keyword wins.
 */
export const LOG_LEVEL_RULES: readonly LogLevelRule[] = [
  { level: 'FATAL', keywords: ['FATAL', 'CRITICAL'] },
  { level: 'ERROR', keywords: ['ERROR', 'ERR'] },
  { level: 'WARNING', keywords: ['WARN', 'WARNING'] },
  { level: 'INFO', keywords: ['INFO'] },
  { level: 'DEBUG', keywords: ['DEBUG'] },
];

/**
 * Lower-case phrases that flag a line as an issue regardless of its level.
 * Several matches mean the same as one.
 */
export const ISSUE_KEYWORDS: readonly string[] = [
  'exception',
  'panic',
  'crash',
  'failed',
  'timeout',
  'unable to',
  'cannot',
  'refused',
  'denied',
];

const ISSUE_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(['FATAL', 'ERROR', 'WARNING']);

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify a line by the first matching rule in {@link LOG_LEVEL_RULES}
 */
export function classifyLogLevel(content: string): LogLevel {
  const upper = content.toUpperCase();
  for (const rule of LOG_LEVEL_RULES) {
    if (rule.keywords.some((keyword) => upper.includes(keyword))) {
      return rule.level;
    }
  }
  return 'UNKNOWN';
}

export function isIssueLevel(level: LogLevel): boolean {
  return ISSUE_LEVELS.has(level);
}

export function hasIssueKeyword(content: string): boolean {
  const lower = content.toLowerCase();
  return ISSUE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * True for FATAL/ERROR/WARNING lines and for lines naming a failure
 * without a severity keyword
 */
export function isPotentialIssue(content: string, level: LogLevel = classifyLogLevel(content)): boolean {
  return isIssueLevel(level) || hasIssueKeyword(content);
}
