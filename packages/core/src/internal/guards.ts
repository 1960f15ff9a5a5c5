/**
 * Argument guards shared by the public operations
 */

export function requireNonNull<T>(value: T, name: string): NonNullable<T> {
  if (value === null || value === undefined) {
    throw new TypeError(`${name} must not be null or undefined`);
  }
  return value;
}

export function requireIndex(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new RangeError(`Invalid index ${index} for length ${length}`);
  }
}

export function requireLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Invalid array length ${length}`);
  }
}

export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}
