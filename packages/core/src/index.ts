/**
 * arrayops – stateless helpers around plain and typed arrays
 *
 * - forEach / forEachIndexed       → ordered iteration
 * - fill / fillTyped / replace     → construction and in-place writes
 * - randomElement / randomNumeric  → injectable random selection
 * - concat / concatTyped           → multi-array concatenation
 * - convert*                       → element-type conversion
 * - join                           → delimiter-joined stringification
 * - contains / count*Null          → linear search and null counting
 */

export { forEach, forEachIndexed } from './iterate';

export { fill, fillTyped, replace, randomElement, randomNumeric } from './construct';

export { concat, concatTyped } from './concat';

export { convert, convertAll, convertToNumbers } from './convert';

export { join } from './join';

export {
  contains,
  countNull,
  countNonNull,
  parallelCountNull,
  parallelCountNonNull,
} from './search';

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
  arrayTypeOf,
  isNumericArray,
  isBigIntArray,
  isTypedArray,
  COPY_THRESHOLD,
  PARTITION_SIZE,
} from './internal';

export type {
  ArrayType,
  MutableArrayLike,
  NumericArray,
  BigIntArray,
  TypedArray,
  BaseTypedArray,
  RandomSource,
  Consumer,
  IndexedConsumer,
  Converter,
  Delimiter,
} from './internal';
