/**
 * Internal modules barrel export
 */

// Constants
export { COPY_THRESHOLD, SPLICE_CHUNK_SIZE, PARTITION_SIZE } from './constants';

// Copy strategy
export { arraycopy } from './copy';

// Element-type descriptors
export {
  objectArray,
  int8,
  uint8,
  uint8Clamped,
  int16,
  uint16,
  int32,
  uint32,
  float32,
  float64,
  bigInt64,
  bigUint64,
  isNumericArray,
  isBigIntArray,
  isTypedArray,
  arrayTypeOf,
  commonArrayType,
} from './array-types';

// Equality
export { valueEquals } from './equals';

// Guards
export { requireNonNull, requireIndex, requireLength, isAbsent } from './guards';

// Types
export type {
  MutableArrayLike,
  ArrayType,
  NumericArray,
  BigIntArray,
  TypedArray,
  BaseTypedArray,
  RandomSource,
  Consumer,
  IndexedConsumer,
  Converter,
  Delimiter,
} from './types';
