/**
 * Element-type descriptors
 *
 * A descriptor allocates result arrays of one concrete kind, standing in for
 * the element type that generics erase at runtime.
 */

import type { ArrayType, BigIntArray, MutableArrayLike, NumericArray, TypedArray } from './types';

function typedArrayType<E, A extends MutableArrayLike<E>>(
  ctor: { new (length: number): A; readonly name: string },
): ArrayType<E, A> {
  return {
    name: ctor.name,
    create: length => new ctor(length),
    isInstance: (value): value is A => value instanceof ctor,
  };
}

/** Descriptor for plain `T[]` results. */
export function objectArray<T>(): ArrayType<T, T[]> {
  return {
    name: 'Array',
    create: length => new Array<T>(length),
    isInstance: (value): value is T[] => Array.isArray(value),
  };
}

export const int8 = typedArrayType<number, Int8Array>(Int8Array);
export const uint8 = typedArrayType<number, Uint8Array>(Uint8Array);
export const uint8Clamped = typedArrayType<number, Uint8ClampedArray>(Uint8ClampedArray);
export const int16 = typedArrayType<number, Int16Array>(Int16Array);
export const uint16 = typedArrayType<number, Uint16Array>(Uint16Array);
export const int32 = typedArrayType<number, Int32Array>(Int32Array);
export const uint32 = typedArrayType<number, Uint32Array>(Uint32Array);
export const float32 = typedArrayType<number, Float32Array>(Float32Array);
export const float64 = typedArrayType<number, Float64Array>(Float64Array);
export const bigInt64 = typedArrayType<bigint, BigInt64Array>(BigInt64Array);
export const bigUint64 = typedArrayType<bigint, BigUint64Array>(BigUint64Array);

const NUMERIC_TYPES: readonly ArrayType<number, NumericArray>[] = [
  int8, uint8, uint8Clamped, int16, uint16, int32, uint32, float32, float64,
];

const BIGINT_TYPES: readonly ArrayType<bigint, BigIntArray>[] = [bigInt64, bigUint64];

// Shared descriptor for anything that is not a typed array
const OBJECT_ARRAY = objectArray<unknown>();

export function isNumericArray(value: unknown): value is NumericArray {
  return NUMERIC_TYPES.some(type => type.isInstance(value));
}

export function isBigIntArray(value: unknown): value is BigIntArray {
  return BIGINT_TYPES.some(type => type.isInstance(value));
}

export function isTypedArray(value: unknown): value is TypedArray {
  return isNumericArray(value) || isBigIntArray(value);
}

/**
 * Runtime kind query: the descriptor an array was allocated with.
 * Plain arrays and other array-likes map to the shared object-array descriptor.
 */
export function arrayTypeOf(array: ArrayLike<unknown>): ArrayType<unknown> {
  if (ArrayBuffer.isView(array)) {
    for (const type of NUMERIC_TYPES) {
      if (type.isInstance(array)) return type;
    }
    for (const type of BIGINT_TYPES) {
      if (type.isInstance(array)) return type;
    }
  }
  return OBJECT_ARRAY;
}

/**
 * Descriptor shared by every array of a group.
 * @throws TypeError when the group mixes array kinds
 */
export function commonArrayType(arrays: readonly ArrayLike<unknown>[]): ArrayType<unknown> {
  const type = arrays.length === 0 ? OBJECT_ARRAY : arrayTypeOf(arrays[0]);
  for (let i = 1; i < arrays.length; i++) {
    const other = arrayTypeOf(arrays[i]);
    if (other !== type) {
      throw new TypeError(`Cannot store ${other.name} elements in ${type.name}`);
    }
  }
  return type;
}
