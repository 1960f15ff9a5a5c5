/**
 * Benchmark: concat vs Array#concat and spread
 */

import { bench, describe } from 'vitest';
import { concat } from '../packages/core/src/index';

// ===== Setup =====
const LARGE = 10000;

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i);
}

describe('Many small arrays (100 x 3) - Concat', () => {
  const arrays = Array.from({ length: 100 }, (_, i) => [i, i + 1, i + 2]);
  const empty: number[] = [];

  bench('Native (concat)', () => {
    empty.concat(...arrays);
  });

  bench('Native (flat)', () => {
    arrays.flat();
  });

  bench('arrayops (concat)', () => {
    concat(...arrays);
  });
});

describe('Medium arrays (1000 + 1000) - Concat', () => {
  const native1 = createArray(1000);
  const native2 = createArray(1000);

  bench('Native (concat)', () => {
    native1.concat(native2);
  });

  bench('Native (spread)', () => {
    [...native1, ...native2];
  });

  bench('arrayops (concat)', () => {
    concat(native1, native2);
  });
});

describe('Large typed arrays (10000 + 10000) - Concat', () => {
  const typed1 = Float64Array.from(createArray(LARGE));
  const typed2 = Float64Array.from(createArray(LARGE));

  bench('Native (set)', () => {
    const result = new Float64Array(LARGE * 2);
    result.set(typed1);
    result.set(typed2, LARGE);
    result;
  });

  bench('arrayops (concat)', () => {
    concat(typed1, typed2);
  });
});
