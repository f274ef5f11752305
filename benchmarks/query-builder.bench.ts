/**
 * Query Builder Performance Benchmarks
 *
 * Measures SQL text generation for lookups and batched inserts.
 * Run with: npm run bench
 */

import { bench, describe } from 'vitest';

import { buildInsert, buildLookup } from '@pgsession/core';

import type { ValueTuple } from '@pgsession/core';

const columns = ['sensor', 'recorded_at', 'value', 'unit'];

function createTuples(count: number): ValueTuple[] {
  return Array.from({ length: count }, (_, i) => [`sensor-${i % 16}`, new Date(0), i * 0.5, 'C']);
}

const singleRow = createTuples(1);
const smallBatch = createTuples(10);
const fullBatch = createTuples(1000);

describe('buildLookup', () => {
  bench('three-column lookup', () => {
    buildLookup('readings', { sensor: 'sensor-1', unit: 'C', value: 21.5 });
  });
});

describe('buildInsert', () => {
  bench('single row', () => {
    buildInsert('readings', columns, singleRow);
  });

  bench('10 rows', () => {
    buildInsert('readings', columns, smallBatch, { onConflict: 'DO NOTHING' });
  });

  bench('1000 rows', () => {
    buildInsert('readings', columns, fullBatch, { onConflict: 'DO NOTHING' });
  });
});
