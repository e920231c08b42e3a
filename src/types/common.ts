/**
 * @module types/common
 * @description Shared utility types and the error taxonomy used across all modules
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Result Type (Error Handling Without Throwing)
// ============================================================================

/**
 * Represents the outcome of an operation that can fail
 * @template T - The success data type
 * @template E - The error type (defaults to ArgoCDError)
 *
 * @example
 * const result = await client.getApplication({ name: 'guestbook' });
 * if (result.success) {
 *   console.log(result.data.metadata?.name);
 * } else {
 *   console.error(formatError(result.error));
 * }
 */
export type Result<T, E = ArgoCDError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful Result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Standardized error structure for all modules
 */
export interface AppError {
  /** Machine-readable error code */
  code: string;
  /** Human-readable message */
  message: string;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

/**
 * Error taxonomy for everything that can go wrong between a tool call and
 * the Argo CD API.
 */
export type ArgoCDErrorCode =
  | 'Authentication'
  | 'Authorization'
  | 'NotFound'
  | 'Conflict'
  | 'BadRequest'
  | 'ServerError'
  | 'NetworkError'
  | 'ParseError'
  | 'ReadOnlyModeViolation'
  | 'Configuration';

export interface ArgoCDError extends AppError {
  code: ArgoCDErrorCode;
  /** HTTP status of the upstream response, when there was one */
  status?: number;
}

/**
 * Creates an ArgoCDError, omitting absent optional fields
 */
export function argoError(
  code: ArgoCDErrorCode,
  message: string,
  extra: { status?: number; context?: Record<string, unknown>; cause?: Error } = {}
): ArgoCDError {
  const error: ArgoCDError = { code, message };
  if (extra.status !== undefined) error.status = extra.status;
  if (extra.context !== undefined) error.context = extra.context;
  if (extra.cause !== undefined) error.cause = extra.cause;
  return error;
}

// ============================================================================
// Generic Utility Types
// ============================================================================

/**
 * Extracts the data type from a Result
 */
export type ResultData<R> = R extends Result<infer T, unknown> ? T : never;

/**
 * Extracts the error type from a Result
 */
export type ResultError<R> = R extends Result<unknown, infer E> ? E : never;
