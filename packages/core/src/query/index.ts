/**
 * Query Builder Module
 *
 * Pure SQL text construction for lookups and (batched) inserts.
 *
 * @module query
 */

export { buildLookup, buildInsert } from './query-builder';
export { ParameterSequence } from './parameter-sequence';
export { toRowEntries, splitRow, findRowEntry } from './row';
