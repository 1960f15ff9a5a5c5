/**
 * Deep value equality used by membership search
 *
 * Set members and Map keys are matched by identity first, then by deep
 * equality against the members of the other side not matched by identity.
 * A pair of objects already under comparison higher up the stack counts as
 * equal, so cyclic structures terminate.
 */

import { isTypedArray } from './array-types';

// Object pairs currently being compared: left → rights
type Comparing = WeakMap<object, WeakSet<object>>;

// SameValueZero: NaN equals NaN, +0 equals -0
function sameValueZero(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (a === 0 && b === 0) return true;
  }
  return Object.is(a, b);
}

function elementsEqual(a: ArrayLike<unknown>, b: ArrayLike<unknown>, comparing: Comparing): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!deepEquals(a[i], b[i], comparing)) return false;
  }
  return true;
}

// Removes and returns the first candidate deep-equal to `value`
function takeMatch(value: unknown, candidates: unknown[], comparing: Comparing): boolean {
  const index = candidates.findIndex(candidate => deepEquals(value, candidate, comparing));
  if (index < 0) return false;
  candidates.splice(index, 1);
  return true;
}

function mapsEqual(a: Map<unknown, unknown>, b: Map<unknown, unknown>, comparing: Comparing): boolean {
  if (a.size !== b.size) return false;
  const unmatched = [...b.keys()].filter(key => !a.has(key));
  for (const [key, value] of a) {
    if (b.has(key)) {
      if (!deepEquals(value, b.get(key), comparing)) return false;
      continue;
    }
    const index = unmatched.findIndex(
      other => deepEquals(key, other, comparing) && deepEquals(value, b.get(other), comparing),
    );
    if (index < 0) return false;
    unmatched.splice(index, 1);
  }
  return true;
}

function setsEqual(a: Set<unknown>, b: Set<unknown>, comparing: Comparing): boolean {
  if (a.size !== b.size) return false;
  const unmatched = [...b].filter(value => !a.has(value));
  for (const value of a) {
    if (b.has(value)) continue;
    if (!takeMatch(value, unmatched, comparing)) return false;
  }
  return true;
}

function isRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function structurallyEqual(a: object, b: object, comparing: Comparing): boolean {
  if (Array.isArray(a)) {
    return Array.isArray(b) && elementsEqual(a, b, comparing);
  }
  if (isTypedArray(a)) {
    return isTypedArray(b) && a.constructor === b.constructor && elementsEqual(a, b, comparing);
  }
  if (a instanceof Date) {
    return b instanceof Date && sameValueZero(a.getTime(), b.getTime());
  }
  if (a instanceof Map) {
    return b instanceof Map && mapsEqual(a, b, comparing);
  }
  if (a instanceof Set) {
    return b instanceof Set && setsEqual(a, b, comparing);
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
      if (!deepEquals(a[key], b[key], comparing)) return false;
    }
    return true;
  }
  return false;
}

function deepEquals(a: unknown, b: unknown, comparing: Comparing): boolean {
  if (sameValueZero(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  let rights = comparing.get(a);
  if (rights?.has(b)) return true;
  if (!rights) {
    rights = new WeakSet();
    comparing.set(a, rights);
  }

  rights.add(b);
  const equal = structurallyEqual(a, b, comparing);
  rights.delete(b);
  return equal;
}

export function valueEquals(a: unknown, b: unknown): boolean {
  return deepEquals(a, b, new WeakMap());
}
