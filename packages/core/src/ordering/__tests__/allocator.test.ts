import { describe, it, expect } from 'vitest';
import { allocateOrderIndex } from '../allocator.js';
import { assertCapacity } from '../capacity.js';
import { CapacityExceededError, InvalidPositionError } from '../../errors.js';

describe('allocateOrderIndex', () => {
  it('allocateOrderIndex_EmptyCollection_ReturnsZero', () => {
    expect(allocateOrderIndex([])).toBe(0);
  });

  it('allocateOrderIndex_EmptyCollectionWithPositionZero_ReturnsZero', () => {
    expect(allocateOrderIndex([], 0)).toBe(0);
  });

  it('allocateOrderIndex_NoPosition_AppendsAfterHighest', () => {
    expect(allocateOrderIndex([2, 0, 1])).toBe(3);
  });

  it('allocateOrderIndex_PositionEqualToLength_Appends', () => {
    expect(allocateOrderIndex([0, 1, 2], 3)).toBe(3);
  });

  it('allocateOrderIndex_PositionInsideRange_ReturnsPosition', () => {
    expect(allocateOrderIndex([0, 1, 2], 0)).toBe(0);
    expect(allocateOrderIndex([0, 1, 2], 2)).toBe(2);
  });

  it('allocateOrderIndex_PositionPastLength_ThrowsInvalidPosition', () => {
    expect(() => allocateOrderIndex([0, 1, 2], 4)).toThrow(InvalidPositionError);
  });

  it('allocateOrderIndex_NegativePosition_ThrowsInvalidPosition', () => {
    expect(() => allocateOrderIndex([0, 1], -1)).toThrow(InvalidPositionError);
  });

  it('allocateOrderIndex_FractionalPosition_ThrowsInvalidPosition', () => {
    expect(() => allocateOrderIndex([0, 1], 0.5)).toThrow(InvalidPositionError);
  });
});

describe('assertCapacity', () => {
  it('assertCapacity_BelowBound_Passes', () => {
    expect(() => assertCapacity(9, 10, 'item')).not.toThrow();
  });

  it('assertCapacity_AtBound_ThrowsCapacityExceeded', () => {
    expect(() => assertCapacity(10, 10, 'item')).toThrow(CapacityExceededError);
  });

  it('assertCapacity_ItemKind_UsesItemMessage', () => {
    expect(() => assertCapacity(10, 10, 'item')).toThrow(
      'Maximum number of items (10) reached for specification'
    );
  });

  it('assertCapacity_SpecificationKind_CarriesBound', () => {
    try {
      assertCapacity(3, 3, 'specification');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CapacityExceededError);
      if (error instanceof CapacityExceededError) {
        expect(error.kind).toBe('specification');
        expect(error.maxAllowed).toBe(3);
        expect(error.code).toBe('CAPACITY_EXCEEDED');
      }
    }
  });
});
