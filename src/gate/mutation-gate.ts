/**
 * @module gate/mutation-gate
 * @description Process-wide read-only policy checked before any state-changing request is built
 * @status COMPLETE
 * @dependencies src/types/common.ts, src/client/errors.ts
 * @lastModified 2026-10-19
 */

import { ok, err, type Result, type ArgoCDError } from '../types/common.js';
import { readOnlyViolation } from '../client/errors.js';

// ============================================================================
// Types
// ============================================================================

/** `open` permits writes, `closed` blocks them */
export type GateState = 'open' | 'closed';

export interface MutationGate {
  readonly state: GateState;
}

/**
 * Operations that change cluster or application state
 */
export const WRITE_OPERATIONS = ['sync_application', 'rollback_application', 'patch_resource'] as const;

export type WriteOperation = typeof WRITE_OPERATIONS[number];

// ============================================================================
// Gate
// ============================================================================

/**
 * Build the gate once at startup. The returned object is frozen.
 */
export function createMutationGate(readOnly: boolean): MutationGate {
  const state: GateState = readOnly ? 'closed' : 'open';
  return Object.freeze({ state });
}

export function isReadOnly(gate: MutationGate): boolean {
  return gate.state === 'closed';
}

/**
 * Fail fast for a write under a closed gate. Callers must check this before
 * constructing the upstream request.
 */
export function checkWrite(gate: MutationGate, operation: WriteOperation): Result<void, ArgoCDError> {
  if (gate.state === 'closed') {
    return err(readOnlyViolation(operation));
  }
  return ok(undefined);
}
