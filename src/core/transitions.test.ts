import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { canTransition } from './transitions.js';
import { AssignmentStatus } from '../types/contracts.js';

describe('canTransition', () => {
  const allStatuses: AssignmentStatus[] = ['pending', 'sent', 'failed'];

  const allowedTransitions: Record<AssignmentStatus, AssignmentStatus[]> = {
    pending: ['sent', 'failed'],
    failed: ['pending'],
    sent: []
  };

  it('should allow valid transitions', () => {
    for (const from of allStatuses) {
      for (const to of allowedTransitions[from]) {
        assert.equal(canTransition(from, to), true, `Transition from ${from} to ${to} should be allowed`);
      }
    }
  });

  it('should disallow invalid transitions', () => {
    for (const from of allStatuses) {
      for (const to of allStatuses) {
        if (!allowedTransitions[from].includes(to)) {
          assert.equal(canTransition(from, to), false, `Transition from ${from} to ${to} should be disallowed`);
        }
      }
    }
  });

  it('should treat sent as terminal', () => {
    for (const to of allStatuses) {
      assert.equal(canTransition('sent', to), false);
    }
  });
});
