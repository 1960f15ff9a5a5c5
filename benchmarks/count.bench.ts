/**
 * Benchmark: sequential vs partitioned null counting
 * Used to pick PARTITION_SIZE.
 */

import { bench, describe } from 'vitest';
import { countNull, parallelCountNull } from '../packages/core/src/index';

// ===== Setup =====
const SIZES = [1000, 100_000, 1_000_000];

function createSparse(size: number): (number | null)[] {
  return Array.from({ length: size }, (_, i) => (i % 7 === 0 ? null : i));
}

for (const size of SIZES) {
  describe(`Count nulls (${size} items)`, () => {
    const array = createSparse(size);

    bench('Native (filter)', () => {
      array.filter(v => v == null).length;
    });

    bench('countNull', () => {
      countNull(array);
    });

    bench('parallelCountNull', () => {
      parallelCountNull(array);
    });
  });
}
