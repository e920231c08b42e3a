/**
 * @module analyzer
 * @description Pure summarizers that turn Argo CD payloads into bounded summaries
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-19
 */

export {
  LOG_LEVEL_RULES,
  ISSUE_KEYWORDS,
  classifyLogLevel,
  isPotentialIssue,
  isIssueLevel,
  hasIssueKeyword,
  type LogLevelRule,
} from './log-classifier.js';

export {
  parseLogStream,
  analyzePodLogs,
  analyzeLogLine,
  type AnalyzeOptions,
  type LogStreamContext,
} from './log-analyzer.js';

export { aggregateEvents, compareEvents, eventRecency } from './event-aggregator.js';

export { toResourceNodes, summarizeResourceTree, isOrphan } from './resource-tree.js';

export { summarizeServerSideDiff, toDiffEntry } from './diff-summarizer.js';

export { formatHistory, shortRevision, deployDurationSeconds } from './history-formatter.js';

export {
  summarizeApplication,
  summarizeApplicationDetail,
  applicationNames,
  parseManifest,
  summarizeManifests,
  signatureStatus,
  summarizeRevisionMetadata,
  summarizeSyncWindows,
  summarizeResource,
  summarizeResourceManifest,
  resourceStatusLine,
  truncateManifest,
  summarizeSync,
  summarizeRollback,
  compareRefresh,
  type ResourceIdentity,
  type SyncOptionsEcho,
} from './application.js';
