/**
 * Construction, in-place replacement and random selection
 */

import {
  isBigIntArray,
  requireIndex,
  requireLength,
  requireNonNull,
  type ArrayType,
  type BigIntArray,
  type MutableArrayLike,
  type NumericArray,
  type RandomSource,
} from './internal';

/**
 * Creates a `T[]` of `length` slots, each set to `defaultValue`.
 * @throws TypeError if `defaultValue` is null or undefined
 * @throws RangeError if `length` is not a non-negative integer
 */
export function fill<T>(length: number, defaultValue: T): T[] {
  const value = requireNonNull(defaultValue, 'defaultValue');
  requireLength(length);
  const array = new Array<T>(length);
  for (let i = 0; i < length; i++) {
    array[i] = value;
  }
  return array;
}

/**
 * Creates an array of the kind `type` describes, every slot set to
 * `defaultValue`. Intended for typed arrays: `fillTyped(int32, 3, 7)`.
 * @throws RangeError if `length` is not a non-negative integer
 */
export function fillTyped<E, A extends MutableArrayLike<E>>(
  type: ArrayType<E, A>,
  length: number,
  defaultValue: E,
): A {
  requireLength(length);
  const array = type.create(length);
  const slots: MutableArrayLike<E> = array;
  switch (length) {
    case 0:
      return array;
    case 1:
      slots[0] = defaultValue;
      return array;
    case 2:
      slots[0] = defaultValue;
      slots[1] = defaultValue;
      return array;
    case 3:
      slots[0] = defaultValue;
      slots[1] = defaultValue;
      slots[2] = defaultValue;
      return array;
    default:
      for (let i = 0; i < length; i++) {
        slots[i] = defaultValue;
      }
      return array;
  }
}

/**
 * Writes `replacement` at `index` and returns the value it displaced
 * (`undefined` for a hole).
 * @throws RangeError if `index` is outside `[0, array.length)`
 */
export function replace<T>(array: MutableArrayLike<T>, index: number, replacement: T): T {
  requireIndex(index, array.length);
  const previous = array[index];
  array[index] = replacement;
  return previous;
}

function pick(length: number, random: RandomSource): number {
  return Math.min(Math.floor(random() * length), length - 1);
}

/**
 * Returns a uniformly chosen element, or `undefined` for an empty array.
 * `random` is not consulted for arrays of one element.
 */
export function randomElement<T>(array: ArrayLike<T>, random: RandomSource = Math.random): T | undefined {
  switch (array.length) {
    case 0:
      return undefined;
    case 1:
      return array[0];
    default:
      return array[pick(array.length, random)];
  }
}

/**
 * Typed-array variant of {@link randomElement}: an empty array yields zero.
 */
export function randomNumeric(array: BigIntArray, random?: RandomSource): bigint;
export function randomNumeric(array: NumericArray, random?: RandomSource): number;
export function randomNumeric(
  array: NumericArray | BigIntArray,
  random: RandomSource = Math.random,
): number | bigint {
  switch (array.length) {
    case 0:
      return isBigIntArray(array) ? 0n : 0;
    case 1:
      return array[0];
    default:
      return array[pick(array.length, random)];
  }
}
