/**
 * Ordered iteration
 */

import { requireNonNull, type Consumer, type IndexedConsumer } from './internal';

/**
 * Invokes `action` on every element of `array`, in ascending index order.
 * @throws TypeError if `action` is null or undefined
 */
export function forEach<T>(action: Consumer<T>, array: ArrayLike<T>): void {
  const fn = requireNonNull(action, 'action');
  const length = array.length;
  for (let i = 0; i < length; i++) {
    fn(array[i]);
  }
}

/**
 * Like {@link forEach}, but `action` also receives the index (from 0).
 * @throws TypeError if `action` is null or undefined
 */
export function forEachIndexed<T>(action: IndexedConsumer<T>, array: ArrayLike<T>): void {
  const fn = requireNonNull(action, 'action');
  const length = array.length;
  for (let i = 0; i < length; i++) {
    fn(i, array[i]);
  }
}
