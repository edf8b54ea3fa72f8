import { CapacityExceededError } from '../errors.js';
import type { ChildKind } from '../types/index.js';

/**
 * Reject an insert that would take a parent past its bound.
 * Must run inside the same critical section as the insert it guards.
 */
export function assertCapacity(currentCount: number, maxAllowed: number, kind: ChildKind): void {
  if (currentCount >= maxAllowed) {
    throw new CapacityExceededError(kind, maxAllowed);
  }
}
