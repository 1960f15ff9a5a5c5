/**
 * Delimiter-joined stringification
 */

import type { Delimiter } from './internal';

function hasPrimitiveForm(value: object): boolean {
  return (
    typeof Reflect.get(value, Symbol.toPrimitive) === 'function' ||
    typeof Reflect.get(value, 'toString') === 'function' ||
    typeof Reflect.get(value, 'valueOf') === 'function'
  );
}

// String(value), except objects without a primitive form (e.g. null-prototype
// records) render as their `[object Tag]` string
function render(value: unknown): string {
  if (typeof value === 'object' && value !== null && !hasPrimitiveForm(value)) {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}

/**
 * Joins the `String(...)` form of every element with `delimiter` between
 * consecutive elements. A null or undefined delimiter joins with `''`.
 * Accepts plain arrays and typed arrays alike.
 *
 * @example
 * join(',', ['a', 'b', 'c']); // 'a,b,c'
 * join('-', BigInt64Array.of(1n, 2n)); // '1-2'
 */
export function join(delimiter: Delimiter, array: ArrayLike<unknown>): string {
  const sep = delimiter ?? '';
  const length = array.length;
  switch (length) {
    case 0:
      return '';
    case 1:
      return render(array[0]);
    case 2:
      return render(array[0]) + sep + render(array[1]);
    default: {
      let out = render(array[0]);
      for (let i = 1; i < length; i++) {
        out += sep;
        out += render(array[i]);
      }
      return out;
    }
  }
}
