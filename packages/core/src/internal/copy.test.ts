/**
 * Tests for the copy strategy helper
 */

import { describe, it, expect } from 'vitest';
import { arraycopy } from './copy';
import { COPY_THRESHOLD, SPLICE_CHUNK_SIZE } from './constants';

describe('arraycopy', () => {
  describe('element loop (short runs)', () => {
    it('should copy a run shorter than the threshold', () => {
      const dest = [0, 0, 0, 0, 0];
      arraycopy([1, 2, 3], 0, dest, 1, 3);

      expect(dest).toEqual([0, 1, 2, 3, 0]);
    });

    it('should copy from an offset in the source', () => {
      const dest = ['-', '-'];
      arraycopy(['a', 'b', 'c', 'd'], 2, dest, 0, 2);

      expect(dest).toEqual(['c', 'd']);
    });

    it('should treat a zero-length copy as a no-op', () => {
      const dest = [1, 2];
      arraycopy([], 0, dest, 2, 0);

      expect(dest).toEqual([1, 2]);
    });
  });

  describe('bulk copy (runs at or above the threshold)', () => {
    it('should use a threshold of 6', () => {
      expect(COPY_THRESHOLD).toBe(6);
    });

    it('should copy plain arrays without changing the destination length', () => {
      const src = Array.from({ length: 10 }, (_, i) => i);
      const dest = new Array<number>(12).fill(0);
      arraycopy(src, 2, dest, 1, 8);

      expect(dest).toEqual([0, 2, 3, 4, 5, 6, 7, 8, 9, 0, 0, 0]);
      expect(dest.length).toBe(12);
    });

    it('should copy plain arrays longer than one splice chunk', () => {
      const length = SPLICE_CHUNK_SIZE * 2 + 5;
      const src = Array.from({ length }, (_, i) => i);
      const dest = new Array<number>(length);
      arraycopy(src, 0, dest, 0, length);

      expect(dest.length).toBe(length);
      expect(dest[0]).toBe(0);
      expect(dest[SPLICE_CHUNK_SIZE]).toBe(SPLICE_CHUNK_SIZE);
      expect(dest[length - 1]).toBe(length - 1);
    });

    it('should copy typed arrays', () => {
      const src = Int32Array.from({ length: 10 }, (_, i) => i * 2);
      const dest = new Int32Array(10);
      arraycopy(src, 0, dest, 0, 10);

      expect(dest).toEqual(src);
    });

    it('should copy between numeric typed arrays of different kinds', () => {
      const dest = new Float64Array(8);
      arraycopy(Int16Array.of(1, 2, 3, 4, 5, 6, 7), 0, dest, 1, 7);

      expect(Array.from(dest)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('should copy bigint typed arrays', () => {
      const dest = new BigInt64Array(7);
      arraycopy(BigInt64Array.of(1n, 2n, 3n, 4n, 5n, 6n, 7n), 0, dest, 0, 7);

      expect(Array.from(dest)).toEqual([1n, 2n, 3n, 4n, 5n, 6n, 7n]);
    });

    it('should fall back to the loop for a plain source and typed destination', () => {
      const dest = new Uint8Array(6);
      arraycopy([9, 8, 7, 6, 5, 4], 0, dest, 0, 6);

      expect(dest).toEqual(Uint8Array.of(9, 8, 7, 6, 5, 4));
    });
  });

  describe('bounds', () => {
    it('should reject a destination region past the end', () => {
      const dest = [0];

      expect(() => arraycopy([1, 2], 0, dest, 0, 2)).toThrow(RangeError);
      expect(dest).toEqual([0]);
    });

    it('should reject a source region past the end', () => {
      expect(() => arraycopy([1, 2], 1, [0, 0], 0, 2)).toThrow(
        'Source region [1, 3) out of bounds for length 2',
      );
    });

    it('should reject negative positions and lengths', () => {
      expect(() => arraycopy([1], -1, [0], 0, 1)).toThrow(RangeError);
      expect(() => arraycopy([1], 0, [0], -1, 1)).toThrow(RangeError);
      expect(() => arraycopy([1], 0, [0], 0, -1)).toThrow('Invalid copy length -1');
    });

    it('should reject bulk regions past the end of typed arrays', () => {
      expect(() => arraycopy(new Int8Array(10), 0, new Int8Array(8), 0, 10)).toThrow(RangeError);
    });
  });
});
