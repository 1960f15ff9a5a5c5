/**
 * Typed arrays and element-type descriptors
 */

import {
  arrayTypeOf,
  concat,
  concatTyped,
  convert,
  convertAll,
  convertToNumbers,
  fillTyped,
  float32,
  int32,
  join,
  objectArray,
  randomNumeric,
} from '../packages/core/src/index';

console.log('=== arrayops: typed arrays ===\n');

// ===== Descriptors =====
console.log('1️⃣ fillTyped() with a descriptor');
const sevens = fillTyped(int32, 3, 7);
console.log('fillTyped(int32, 3, 7):', sevens);

// ===== Kind-preserving concat =====
console.log('\n2️⃣ concat() keeps the input kind');
const joined = concat(Int32Array.of(1, 2), sevens);
console.log('result:', joined, 'kind:', arrayTypeOf(joined).name);

console.log('\n3️⃣ concatTyped() allocates with an explicit descriptor');
console.log('concatTyped(float32, [0.5], [1.5, 2.5]):', concatTyped(float32, [0.5], [1.5, 2.5]));

// ===== Conversion =====
console.log('\n4️⃣ convert*()');
const words = ['alpha', 'be', 'gam'];
console.log('convertToNumbers(length):', convertToNumbers((w: string) => w.length, words));
console.log('convert(int32, parseInt):', convert(int32, (s: string) => Number.parseInt(s, 10), ['10', '20']));
console.log(
  'convertAll(objectArray, upper):',
  convertAll(objectArray<string>(), (w: string) => w.toUpperCase(), [words, ['delta']]),
);

// ===== Join & random =====
console.log('\n5️⃣ join() / randomNumeric()');
console.log('join("-", BigInt64Array):', join('-', BigInt64Array.of(1n, 2n, 3n)));
console.log('randomNumeric(empty Int32Array):', randomNumeric(new Int32Array(0)));
