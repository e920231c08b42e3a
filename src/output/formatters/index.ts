/**
 * @module output/formatters
 * @description Exports for all text report formatters
 * @status COMPLETE
 * @dependencies ./shared.ts and one formatter per summary
 * @lastModified 2026-10-19
 */

export { sortedCounts, countLines, resourceLabel } from './shared.js';
export { renderPodLogsReport, noLogsMessage } from './log-formatter.js';
export { renderEventsReport } from './event-formatter.js';
export { renderResourceTreeReport } from './tree-formatter.js';
export { renderServerSideDiffReport } from './diff-formatter.js';
export { renderHistoryReport } from './history-formatter.js';
export {
  renderApplicationList,
  renderApplicationNames,
  renderApplicationDetail,
  renderManifests,
  renderRevisionMetadata,
  renderSyncWindows,
  renderResource,
  renderSync,
  renderRollback,
  renderRefresh,
} from './application-formatter.js';
