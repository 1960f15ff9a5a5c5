/**
 * Core type definitions
 */

// Writable, index-addressable storage (plain arrays and typed arrays)
export interface MutableArrayLike<E> {
  readonly length: number;
  [index: number]: E;
}

// Element-type descriptor: allocates result arrays of one concrete kind
export interface ArrayType<E, A extends MutableArrayLike<E> = MutableArrayLike<E>> {
  readonly name: string;
  create(length: number): A;
  isInstance(value: unknown): value is A;
}

export type NumericArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type BigIntArray = BigInt64Array | BigUint64Array;

export type TypedArray = NumericArray | BigIntArray;

// Built-in typed array kind of A; subclasses such as Buffer map to their base
export type BaseTypedArray<A extends TypedArray> =
  A extends Int8Array ? Int8Array
  : A extends Uint8ClampedArray ? Uint8ClampedArray
  : A extends Uint8Array ? Uint8Array
  : A extends Int16Array ? Int16Array
  : A extends Uint16Array ? Uint16Array
  : A extends Int32Array ? Int32Array
  : A extends Uint32Array ? Uint32Array
  : A extends Float32Array ? Float32Array
  : A extends Float64Array ? Float64Array
  : A extends BigInt64Array ? BigInt64Array
  : A extends BigUint64Array ? BigUint64Array
  : never;

// Uniform source of doubles in [0, 1)
export type RandomSource = () => number;

export type Consumer<T> = (element: T) => void;

export type IndexedConsumer<T> = (index: number, element: T) => void;

export type Converter<S, D> = (element: S) => D;

export type Delimiter = string | null | undefined;
