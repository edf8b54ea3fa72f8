import { InvalidPositionError } from '../errors.js';

/**
 * Compute the order index for a new (or relocated) entry.
 *
 * Without a target, or with a target equal to the collection length, the
 * entry is appended after the highest existing index. Any other in-range
 * target is returned as-is and the caller must shift the tail up by one
 * (see planInsertShift).
 */
export function allocateOrderIndex(existing: readonly number[], targetPosition?: number): number {
  const count = existing.length;

  if (targetPosition !== undefined) {
    if (!Number.isInteger(targetPosition) || targetPosition < 0 || targetPosition > count) {
      throw new InvalidPositionError(targetPosition, count);
    }
    if (targetPosition < count) {
      return targetPosition;
    }
  }

  if (count === 0) return 0;
  return Math.max(...existing) + 1;
}
