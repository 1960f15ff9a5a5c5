/**
 * Linear membership search and null counting
 *
 * "Null" covers every absent slot: `null`, `undefined` and holes.
 */

import { PARTITION_SIZE, isAbsent, valueEquals } from './internal';

/**
 * `true` if some element of `array` deep-equals `value`. An absent `value`
 * matches any absent slot.
 */
export function contains<T>(value: T | null | undefined, array: ArrayLike<T | null | undefined>): boolean {
  const length = array.length;
  if (length === 0) return false;

  if (isAbsent(value)) {
    for (let i = 0; i < length; i++) {
      if (isAbsent(array[i])) return true;
    }
    return false;
  }

  for (let i = 0; i < length; i++) {
    const element = array[i];
    if (!isAbsent(element) && valueEquals(element, value)) return true;
  }
  return false;
}

function countNullRange(array: ArrayLike<unknown>, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (isAbsent(array[i])) count++;
  }
  return count;
}

export function countNull(array: ArrayLike<unknown>): number {
  switch (array.length) {
    case 0:
      return 0;
    case 1:
      return isAbsent(array[0]) ? 1 : 0;
    default:
      return countNullRange(array, 0, array.length);
  }
}

export function countNonNull(array: ArrayLike<unknown>): number {
  return array.length - countNull(array);
}

/**
 * Partitioned {@link countNull}: the array is split into runs of
 * {@link PARTITION_SIZE} elements, each counted on its own, and the partial
 * counts are summed. Always equal to the sequential count.
 */
export function parallelCountNull(array: ArrayLike<unknown>): number {
  const length = array.length;
  if (length <= PARTITION_SIZE) return countNull(array);

  const partials: number[] = [];
  for (let start = 0; start < length; start += PARTITION_SIZE) {
    partials.push(countNullRange(array, start, Math.min(start + PARTITION_SIZE, length)));
  }
  return partials.reduce((sum, partial) => sum + partial, 0);
}

export function parallelCountNonNull(array: ArrayLike<unknown>): number {
  return array.length - parallelCountNull(array);
}
