import { describe, it, expect } from 'vitest';
import { selectInPlace, bufferMedian } from '../quickselect.js';
import { pseudoRandomValues, sortedMedian } from './helpers.js';

describe('Selection', () => {
  describe('selectInPlace()', () => {
    it('should place the k-th smallest with the partition invariant', () => {
      const source = pseudoRandomValues(101, 11, 40);
      const sorted = [...source].sort((a, b) => a - b);

      for (let k = 0; k < source.length; k++) {
        const values = [...source];
        selectInPlace(values, k);

        const kth = values[k]!;
        expect(kth).toBe(sorted[k]);
        expect(values.slice(0, k).every((v) => v <= kth)).toBe(true);
        expect(values.slice(k + 1).every((v) => v >= kth)).toBe(true);
      }
    });

    it('should keep the same multiset of values', () => {
      const values = [5, 3, 9, 3, 1, 9, 0];
      selectInPlace(values, 3);
      expect([...values].sort((a, b) => a - b)).toEqual([0, 1, 3, 3, 5, 9, 9]);
    });

    it('should handle all-equal input', () => {
      const values = [4, 4, 4, 4, 4];
      selectInPlace(values, 2);
      expect(values).toEqual([4, 4, 4, 4, 4]);
    });

    it('should reject an index outside the array', () => {
      expect(() => selectInPlace([1, 2], 2)).toThrow(RangeError);
      expect(() => selectInPlace([1, 2], -1)).toThrow(RangeError);
      expect(() => selectInPlace([], 0)).toThrow(RangeError);
    });
  });

  describe('bufferMedian()', () => {
    it('should return null for an empty buffer', () => {
      expect(bufferMedian([])).toBeNull();
    });

    it('should return the middle element for odd counts', () => {
      expect(bufferMedian([9])).toBe(9);
      expect(bufferMedian([9, 1, 8])).toBe(8);
    });

    it('should average the two middle elements for even counts', () => {
      expect(bufferMedian([9, 1])).toBe(5);
      expect(bufferMedian([9, 1, 8, 2])).toBe(5);
      expect(bufferMedian([3, 1, 2, 2])).toBe(2);
    });

    it('should match a full sort for every prefix', () => {
      const values = pseudoRandomValues(120, 5, 30);
      for (let n = 1; n <= values.length; n++) {
        const prefix = values.slice(0, n);
        expect(bufferMedian(prefix)).toBe(sortedMedian(prefix));
      }
    });

    it('should not reorder the buffer', () => {
      const buffer = [9, 1, 8, 2];
      bufferMedian(buffer);
      expect(buffer).toEqual([9, 1, 8, 2]);
    });
  });
});
