/**
 * @module types/index
 * @description Central export for all type definitions
 * @status COMPLETE
 * @dependencies zod
 * @lastModified 2026-10-19
 */

// Common types
export type {
  Result,
  AppError,
  ArgoCDError,
  ArgoCDErrorCode,
  ResultData,
  ResultError,
} from './common.js';

export { ok, err, argoError } from './common.js';

// Upstream payload schemas and their types
export * from './argocd.js';

// Summary types
export * from './summaries.js';
