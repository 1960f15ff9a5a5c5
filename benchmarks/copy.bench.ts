/**
 * Benchmark: bulk copy vs element loop around COPY_THRESHOLD
 * Re-run after engine upgrades to recalibrate the threshold.
 */

import { bench, describe } from 'vitest';
import { arraycopy } from '../packages/core/src/internal';

// ===== Setup =====
const LENGTHS = [2, 4, 6, 8, 16, 256];

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i);
}

function loopCopy<E>(src: ArrayLike<E>, dest: { [index: number]: E }, length: number): void {
  for (let i = 0; i < length; i++) {
    dest[i] = src[i];
  }
}

// ===== Plain arrays =====
for (const length of LENGTHS) {
  describe(`Plain array - copy ${length} items`, () => {
    const src = createArray(length);
    const dest = new Array<number>(length).fill(0);

    bench('Loop', () => {
      loopCopy(src, dest, length);
    });

    bench('Native (splice)', () => {
      dest.splice(0, length, ...src);
    });

    bench('arraycopy', () => {
      arraycopy(src, 0, dest, 0, length);
    });
  });
}

// ===== Typed arrays =====
for (const length of LENGTHS) {
  describe(`Int32Array - copy ${length} items`, () => {
    const src = Int32Array.from(createArray(length));
    const dest = new Int32Array(length);

    bench('Loop', () => {
      loopCopy(src, dest, length);
    });

    bench('Native (set)', () => {
      dest.set(src.subarray(0, length));
    });

    bench('arraycopy', () => {
      arraycopy(src, 0, dest, 0, length);
    });
  });
}
