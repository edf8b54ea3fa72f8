/**
 * Reindex Engine
 *
 * Keeps sibling order indices dense, zero-based and unique. Each operation
 * is described by at most one IndexShift: an inclusive range of indices that
 * all move by the same delta. A shift is always applied to the whole range in
 * one batch (a single UPDATE in PostgreSQL, a single array replacement in the
 * in-process store).
 */

import { InvalidReorderError } from '../errors.js';
import type { OrderMove } from '../types/index.js';

export interface IndexShift {
  /** Lowest index affected, inclusive */
  from: number;
  /** Highest index affected, inclusive */
  to: number;
  delta: 1 | -1;
}

interface Ordered {
  id: number;
  orderIndex: number;
}

/**
 * Insert at `position` into a collection of `count` entries: the entries at
 * `position` and above move up. Appending needs no shift.
 */
export function planInsertShift(count: number, position: number): IndexShift | null {
  if (position >= count) return null;
  return { from: position, to: count - 1, delta: 1 };
}

/**
 * Delete the entry at `position` from a collection that held `count`
 * entries: everything above it moves down.
 */
export function planDeleteShift(count: number, position: number): IndexShift | null {
  if (position >= count - 1) return null;
  return { from: position + 1, to: count - 1, delta: -1 };
}

/**
 * Move one entry from index `from` to index `to`. The returned shift applies
 * to the siblings only; the moved entry takes `to` directly.
 * Returns null for a move onto the same index.
 */
export function planMove(from: number, to: number): IndexShift | null {
  if (from === to) return null;
  if (to > from) {
    return { from: from + 1, to, delta: -1 };
  }
  return { from: to, to: from - 1, delta: 1 };
}

export function shiftIndex(index: number, shift: IndexShift | null): number {
  if (!shift || index < shift.from || index > shift.to) return index;
  return index + shift.delta;
}

/**
 * Apply a shift to every entry except `excludeId`, returning new objects for
 * the entries that changed.
 */
export function applyShift<T extends Ordered>(
  entries: readonly T[],
  shift: IndexShift | null,
  excludeId?: number
): T[] {
  return entries.map((entry) => {
    if (entry.id === excludeId) return entry;
    const next = shiftIndex(entry.orderIndex, shift);
    return next === entry.orderIndex ? entry : { ...entry, orderIndex: next };
  });
}

export function sortByOrder<T extends Ordered>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => a.orderIndex - b.orderIndex);
}

export function isDenseOrder(indices: readonly number[]): boolean {
  const sorted = [...indices].sort((a, b) => a - b);
  return sorted.every((value, i) => value === i);
}

export function assertDenseOrder(indices: readonly number[]): void {
  if (!isDenseOrder(indices)) {
    throw new Error(`Order indices are not dense: [${indices.join(', ')}]`);
  }
}

/**
 * Validate a full reorder request against the current children of a parent.
 * The moves must name every child exactly once and their indices must be
 * exactly {0..count-1}. Returns the id -> index assignment.
 */
export function resolvePermutation(
  currentIds: readonly number[],
  moves: readonly OrderMove[]
): Map<number, number> {
  const count = currentIds.length;
  if (moves.length !== count) {
    throw new InvalidReorderError(`Expected ${count} moves, received ${moves.length}`, {
      expected: count,
      received: moves.length,
    });
  }

  const known = new Set(currentIds);
  const usedIndices = new Set<number>();
  const assignment = new Map<number, number>();

  for (const move of moves) {
    if (!known.has(move.id)) {
      throw new InvalidReorderError(`Child ${move.id} does not belong to this parent`, { id: move.id });
    }
    if (assignment.has(move.id)) {
      throw new InvalidReorderError(`Child ${move.id} appears more than once`, { id: move.id });
    }
    if (!Number.isInteger(move.orderIndex) || move.orderIndex < 0 || move.orderIndex >= count) {
      throw new InvalidReorderError(`Order index ${move.orderIndex} is outside [0, ${count - 1}]`, {
        id: move.id,
        orderIndex: move.orderIndex,
      });
    }
    if (usedIndices.has(move.orderIndex)) {
      throw new InvalidReorderError(`Order index ${move.orderIndex} is assigned twice`, {
        orderIndex: move.orderIndex,
      });
    }
    usedIndices.add(move.orderIndex);
    assignment.set(move.id, move.orderIndex);
  }

  return assignment;
}
