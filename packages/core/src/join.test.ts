/**
 * Tests for delimiter-joined stringification
 */

import { describe, it, expect } from 'vitest';
import { join } from './join';

describe('join', () => {
  it('should join with the delimiter between elements', () => {
    expect(join(',', ['a', 'b', 'c'])).toBe('a,b,c');
  });

  it('should handle empty, single and pair inputs', () => {
    expect(join(',', [])).toBe('');
    expect(join(',', ['x'])).toBe('x');
    expect(join(', ', ['x', 'y'])).toBe('x, y');
  });

  it('should treat an absent delimiter as empty', () => {
    expect(join(null, ['a', 'b', 'c'])).toBe('abc');
    expect(join(undefined, ['a', 'b'])).toBe('ab');
  });

  it('should render elements with String()', () => {
    expect(join(', ', [1, null, undefined, true])).toBe('1, null, undefined, true');
    expect(join('/', [{ toString: () => 'obj' }, [1, 2]])).toBe('obj/1,2');
  });

  it('should render null-prototype objects without throwing', () => {
    const bare = Object.create(null);

    expect(join(',', [bare])).toBe('[object Object]');
    expect(join(',', ['a', bare, 'b'])).toBe('a,[object Object],b');
  });

  it('should keep a custom toString on null-prototype objects', () => {
    const record = Object.assign(Object.create(null), { toString: () => 'custom' });

    expect(join('/', [record, 1])).toBe('custom/1');
  });

  it('should join numeric typed arrays', () => {
    expect(join('-', Int32Array.of(1, 2, 3))).toBe('1-2-3');
    expect(join(',', Float64Array.of(0.5))).toBe('0.5');
  });

  it('should join bigint typed arrays', () => {
    expect(join('-', BigInt64Array.of(1n, -2n, 3n))).toBe('1--2-3');
  });

  it('should insert exactly length - 1 delimiters', () => {
    const array = Array.from({ length: 10 }, (_, i) => i);
    const result = join('|', array);

    expect(result).toBe('0|1|2|3|4|5|6|7|8|9');
    expect(result.split('|')).toHaveLength(10);
  });
});
