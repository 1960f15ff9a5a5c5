/**
 * Simple usage - plain arrays
 */

import {
  concat,
  contains,
  countNonNull,
  countNull,
  fill,
  forEachIndexed,
  join,
  randomElement,
  replace,
} from '../packages/core/src/index';

console.log('=== arrayops: plain arrays ===\n');

// ===== Construction =====
console.log('1️⃣ fill() - default-filled arrays');
const slots = fill(4, 'empty');
console.log('fill(4, "empty"):', slots);

// ===== In-place replacement =====
console.log('\n2️⃣ replace() - write and get the old value back');
const previous = replace(slots, 1, 'taken');
console.log('previous:', previous);
console.log('slots:', slots);

// ===== Concatenation =====
console.log('\n3️⃣ concat() - always a fresh array');
const merged = concat([1, 2], [3], [], [4, 5]);
console.log('concat([1,2],[3],[],[4,5]):', merged);
const copy = concat(merged);
console.log('concat(merged) === merged:', copy === merged);

// ===== Stringification =====
console.log('\n4️⃣ join()');
console.log('join(", ", merged):', join(', ', merged));
console.log('join(null, ["a","b","c"]):', join(null, ['a', 'b', 'c']));

// ===== Iteration =====
console.log('\n5️⃣ forEachIndexed()');
forEachIndexed((i, slot) => console.log(`  [${i}] ${slot}`), slots);

// ===== Search & count =====
console.log('\n6️⃣ contains() / countNull()');
const users = [{ id: 1 }, null, { id: 2 }, null];
console.log('contains({ id: 2 }):', contains({ id: 2 }, users));
console.log('countNull:', countNull(users));
console.log('countNonNull:', countNonNull(users));

// ===== Random selection =====
console.log('\n7️⃣ randomElement()');
console.log('random pick:', randomElement(['rock', 'paper', 'scissors']));
console.log('always first:', randomElement(['rock', 'paper', 'scissors'], () => 0));
console.log('empty:', randomElement([]));
