/**
 * @module gate/mutation-gate.test
 * @description Unit tests for the read-only mutation gate
 * @status COMPLETE
 * @dependencies src/gate/mutation-gate.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { checkWrite, createMutationGate, isReadOnly, WRITE_OPERATIONS } from './mutation-gate.js';

describe('mutation-gate', () => {
  it('opens when read-only mode is off', () => {
    const gate = createMutationGate(false);

    expect(gate.state).toBe('open');
    expect(isReadOnly(gate)).toBe(false);
    for (const operation of WRITE_OPERATIONS) {
      expect(checkWrite(gate, operation)).toEqual({ success: true, data: undefined });
    }
  });

  it('blocks every write operation when closed', () => {
    const gate = createMutationGate(true);

    expect(isReadOnly(gate)).toBe(true);
    for (const operation of WRITE_OPERATIONS) {
      const result = checkWrite(gate, operation);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('ReadOnlyModeViolation');
        expect(result.error.message).toBe(
          `Operation '${operation}' is blocked: the server is running in read-only mode (ARGOCD_READ_ONLY=true)`
        );
      }
    }
  });

  it('cannot be reopened after creation', () => {
    const gate = createMutationGate(true);

    expect(Object.isFrozen(gate)).toBe(true);
    expect(() => Reflect.set(gate, 'state', 'open')).not.toThrow();
    expect(Reflect.set(gate, 'state', 'open')).toBe(false);
    expect(gate.state).toBe('closed');
  });

  it('gates exactly the three state-changing operations', () => {
    expect([...WRITE_OPERATIONS]).toEqual(['sync_application', 'rollback_application', 'patch_resource']);
  });
});
