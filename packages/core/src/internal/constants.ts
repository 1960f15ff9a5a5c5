/**
 * Tunable constants for arrayops
 *
 * Calibrate with `npm run bench` (benchmarks/copy.bench.ts, count.bench.ts).
 */

// Run length at which a bulk copy beats an element-by-element loop
export const COPY_THRESHOLD = 6;

// Max elements spread into a single Array#splice call
export const SPLICE_CHUNK_SIZE = 8192;

// Elements per partition for the partitioned null counters
export const PARTITION_SIZE = 4096;
