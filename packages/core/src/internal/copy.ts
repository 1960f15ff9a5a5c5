/**
 * Copy strategy: bulk copy for long runs, element loop for short ones
 */

import { COPY_THRESHOLD, SPLICE_CHUNK_SIZE } from './constants';
import { isBigIntArray, isNumericArray } from './array-types';
import type { MutableArrayLike } from './types';

function isPlainArray<E>(value: ArrayLike<E>): value is E[] {
  return Array.isArray(value);
}

function checkRegion(array: ArrayLike<unknown>, pos: number, length: number, label: string): void {
  if (!Number.isInteger(pos) || pos < 0 || pos + length > array.length) {
    throw new RangeError(
      `${label} region [${pos}, ${pos + length}) out of bounds for length ${array.length}`,
    );
  }
}

function spliceCopy<E>(src: E[], srcPos: number, dest: E[], destPos: number, length: number): void {
  for (let done = 0; done < length; done += SPLICE_CHUNK_SIZE) {
    const n = Math.min(SPLICE_CHUNK_SIZE, length - done);
    dest.splice(destPos + done, n, ...src.slice(srcPos + done, srcPos + done + n));
  }
}

/**
 * Copies `length` elements of `src` starting at `srcPos` into `dest` starting
 * at `destPos`. Runs of at least {@link COPY_THRESHOLD} elements use
 * `TypedArray#set` or `Array#splice` when both sides are of the same family.
 * @throws RangeError if either region falls outside its array
 */
export function arraycopy<E>(
  src: ArrayLike<E>,
  srcPos: number,
  dest: MutableArrayLike<E>,
  destPos: number,
  length: number,
): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Invalid copy length ${length}`);
  }
  checkRegion(src, srcPos, length, 'Source');
  checkRegion(dest, destPos, length, 'Destination');

  if (length >= COPY_THRESHOLD) {
    if (isNumericArray(src) && isNumericArray(dest)) {
      dest.set(src.subarray(srcPos, srcPos + length), destPos);
      return;
    }
    if (isBigIntArray(src) && isBigIntArray(dest)) {
      dest.set(src.subarray(srcPos, srcPos + length), destPos);
      return;
    }
    if (isPlainArray(src) && isPlainArray(dest)) {
      spliceCopy(src, srcPos, dest, destPos, length);
      return;
    }
  }

  for (let i = 0; i < length; i++) {
    dest[destPos + i] = src[srcPos + i];
  }
}
