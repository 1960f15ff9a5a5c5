/**
 * Multi-array concatenation
 */

import {
  arraycopy,
  arrayTypeOf,
  commonArrayType,
  type ArrayType,
  type BaseTypedArray,
  type MutableArrayLike,
  type TypedArray,
} from './internal';

function concatWith<E, A extends MutableArrayLike<E>>(type: ArrayType<E, A>, arrays: readonly ArrayLike<E>[]): A {
  let length = 0;
  for (const array of arrays) {
    length += array.length;
  }

  const result = type.create(length);
  const out: MutableArrayLike<E> = result;
  let offset = 0;
  for (const array of arrays) {
    const len = array.length;
    if (len === 0) continue;
    if (len === 1) {
      out[offset++] = array[0];
      continue;
    }
    arraycopy(array, 0, out, offset, len);
    offset += len;
  }
  return result;
}

/**
 * Concatenates `arrays`, in argument order, into a new array of the same kind
 * as the inputs. A single input is copied, never returned as is. Typed array
 * subclasses (`Buffer`) yield their built-in base kind (`Uint8Array`).
 *
 * @example
 * concat([1, 2], [3], [], [4, 5]); // [1, 2, 3, 4, 5]
 * concat(Int32Array.of(1), Int32Array.of(2)); // Int32Array [1, 2]
 *
 * @throws TypeError if the inputs are of different kinds
 */
export function concat<A extends TypedArray>(...arrays: [A, ...A[]]): BaseTypedArray<A>;
export function concat<T>(...arrays: readonly (readonly T[])[]): T[];
export function concat(...arrays: ArrayLike<unknown>[]): MutableArrayLike<unknown> {
  switch (arrays.length) {
    case 0:
      return [];
    case 1: {
      const source = arrays[0];
      const copy = arrayTypeOf(source).create(source.length);
      arraycopy(source, 0, copy, 0, source.length);
      return copy;
    }
    default:
      return concatWith(commonArrayType(arrays), arrays);
  }
}

/**
 * Concatenates `arrays` into a new array allocated by `type`.
 * Zero inputs yield `type.create(0)`.
 */
export function concatTyped<E, A extends MutableArrayLike<E>>(
  type: ArrayType<E, A>,
  ...arrays: ArrayLike<E>[]
): A {
  return concatWith(type, arrays);
}
