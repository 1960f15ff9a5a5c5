/**
 * Tests for multi-array concatenation
 */

import { describe, it, expect } from 'vitest';
import { concat, concatTyped } from './concat';
import { float64, int32, objectArray } from './internal';

describe('concat', () => {
  describe('plain arrays', () => {
    it('should concatenate in argument order, skipping empty arrays', () => {
      expect(concat([1, 2], [3], [], [4, 5])).toEqual([1, 2, 3, 4, 5]);
    });

    it('should return an empty array for no arguments', () => {
      expect(concat()).toEqual([]);
    });

    it('should copy a single array', () => {
      const source = [1, 2];
      const result = concat(source);

      expect(result).toEqual([1, 2]);
      expect(result).not.toBe(source);

      result[0] = 9;
      expect(source[0]).toBe(1);
    });

    it('should concatenate runs longer than the copy threshold', () => {
      const first = Array.from({ length: 10 }, (_, i) => i);
      const last = Array.from({ length: 9 }, (_, i) => i + 11);
      const result = concat(first, [10], last);

      expect(result).toEqual(Array.from({ length: 20 }, (_, i) => i));
    });

    it('should size the result to the sum of the input lengths', () => {
      const inputs = [[1, 2, 3], [], [4], [5, 6, 7, 8, 9, 10, 11]];
      const result = concat(...inputs);

      expect(result.length).toBe(11);
      expect(result).toEqual(inputs.flat());
    });

    it('should not alias any input', () => {
      const a = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];
      const b = ['h'];
      const result = concat(a, b);

      a[0] = 'changed';
      expect(result[0]).toBe('a');
      expect(result).toHaveLength(8);
    });

    it('should keep absent elements', () => {
      expect(concat<string | null>(['a', null], [null])).toEqual(['a', null, null]);
    });
  });

  describe('typed arrays', () => {
    it('should keep the kind of the inputs', () => {
      const result = concat(Int32Array.of(1, 2), Int32Array.of(3));

      expect(result).toBeInstanceOf(Int32Array);
      expect(result).toEqual(Int32Array.of(1, 2, 3));
    });

    it('should copy a single typed array into a new one of the same kind', () => {
      const source = Float32Array.of(1.5, 2.5);
      const result = concat(source);

      expect(result).toBeInstanceOf(Float32Array);
      expect(result).not.toBe(source);
      expect(result.buffer).not.toBe(source.buffer);
      expect(Array.from(result)).toEqual([1.5, 2.5]);
    });

    it('should concatenate long bigint runs', () => {
      const a = BigInt64Array.of(1n, 2n, 3n, 4n, 5n, 6n);
      const b = BigInt64Array.of(7n, 8n, 9n, 10n, 11n, 12n);

      expect(Array.from(concat(a, b))).toEqual([1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 9n, 10n, 11n, 12n]);
    });

    it('should return the base kind for typed array subclasses', () => {
      const result: Uint8Array = concat(Buffer.from('ab'), Buffer.from('cd'));

      expect(Buffer.isBuffer(result)).toBe(false);
      expect(result.constructor).toBe(Uint8Array);
      expect(Array.from(result)).toEqual([97, 98, 99, 100]);
    });

    it('should copy a single subclass input into its base kind', () => {
      const source = Buffer.from('xy');
      const result = concat(source);

      expect(result.constructor).toBe(Uint8Array);
      expect(result).not.toBe(source);
      expect(Array.from(result)).toEqual([120, 121]);
    });

    it('should reject typed arrays of different kinds', () => {
      expect(() => Reflect.apply(concat, undefined, [Int32Array.of(1), Float64Array.of(2)])).toThrow(
        'Cannot store Float64Array elements in Int32Array',
      );
    });

    it('should reject a plain array mixed with a typed array', () => {
      expect(() => Reflect.apply(concat, undefined, [[1], Int32Array.of(2)])).toThrow(TypeError);
    });
  });
});

describe('concatTyped', () => {
  it('should allocate with the given descriptor', () => {
    const result = concatTyped(int32, [1, 2], Int32Array.of(3));

    expect(result).toEqual(Int32Array.of(1, 2, 3));
  });

  it('should return an empty array of the descriptor kind for no arguments', () => {
    const result = concatTyped(float64);

    expect(result).toBeInstanceOf(Float64Array);
    expect(result.length).toBe(0);
  });

  it('should accept any array-like input', () => {
    expect(concatTyped(objectArray<string>(), 'ab', ['c'])).toEqual(['a', 'b', 'c']);
  });
});
