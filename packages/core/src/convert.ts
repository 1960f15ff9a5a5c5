/**
 * Element-type conversion
 */

import {
  float64,
  requireNonNull,
  type ArrayType,
  type Converter,
  type MutableArrayLike,
} from './internal';

/**
 * Maps every element through `converter` into a `Float64Array`.
 */
export function convertToNumbers<S>(converter: Converter<S, number>, array: ArrayLike<S>): Float64Array {
  return convert(float64, converter, array);
}

/**
 * Maps every element through `converter` into a new array allocated by `type`.
 * An empty input returns `type.create(0)` without calling `converter`.
 *
 * @example
 * convert(objectArray<string>(), n => `#${n}`, [1, 2]); // ['#1', '#2']
 */
export function convert<S, D, A extends MutableArrayLike<D>>(
  type: ArrayType<D, A>,
  converter: Converter<S, D>,
  array: ArrayLike<S>,
): A {
  const fn = requireNonNull(converter, 'converter');
  const length = array.length;
  const result = type.create(length);
  const out: MutableArrayLike<D> = result;
  if (length === 0) return result;
  if (length === 1) {
    out[0] = fn(array[0]);
    return result;
  }

  for (let i = 0; i < length; i++) {
    out[i] = fn(array[i]);
  }
  return result;
}

/**
 * Maps the elements of every array in `arrays` into one result allocated by
 * `type`. The result length is the sum of the source lengths; each source is
 * written after the ones before it.
 */
export function convertAll<S, D, A extends MutableArrayLike<D>>(
  type: ArrayType<D, A>,
  converter: Converter<S, D>,
  arrays: readonly ArrayLike<S>[],
): A {
  if (arrays.length === 1) {
    return convert(type, converter, arrays[0]);
  }

  const fn = requireNonNull(converter, 'converter');
  let length = 0;
  for (const array of arrays) {
    length += array.length;
  }

  const result = type.create(length);
  const out: MutableArrayLike<D> = result;
  let offset = 0;
  for (const array of arrays) {
    const len = array.length;
    for (let i = 0; i < len; i++) {
      out[offset + i] = fn(array[i]);
    }
    offset += len;
  }
  return result;
}
