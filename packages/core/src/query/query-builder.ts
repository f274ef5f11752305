/**
 * Query Builder
 *
 * Pure functions that turn a table name and row data into parameterized SQL
 * plus the ordered argument list. Input is validated before any text is built.
 *
 * @example
 * ```typescript
 * buildLookup('people', { name: 'Nano', age: 33 });
 * // { sql: 'SELECT * FROM people WHERE name = $1 AND age = $2', args: ['Nano', 33] }
 *
 * buildInsert('people', ['name', 'age'], [['Nano', 33], ['Ada', 36]], { returning: 'id' });
 * // { sql: 'INSERT INTO people (name, age) VALUES ($1, $2), ($3, $4) RETURNING id',
 * //   args: ['Nano', 33, 'Ada', 36] }
 * ```
 */

import { ValidationError } from '../errors';
import {
  validateColumnName,
  validateReturningColumn,
  validateTableName,
} from '../utils/validation';
import { ParameterSequence } from './parameter-sequence';
import { toRowEntries } from './row';

import type { BuiltQuery, InsertOptions, RowInput, ValueTuple } from '../types';

/**
 * Equality lookup over every column of the row, joined with `AND`.
 */
export function buildLookup(table: string, row: RowInput): BuiltQuery {
  validateTableName(table);

  const entries = toRowEntries(row);
  if (entries.length === 0) {
    throw new ValidationError('Cannot build a lookup from an empty row', 'row');
  }

  const params = new ParameterSequence();
  const predicates = entries.map(([column]) => {
    validateColumnName(column);
    return `${column} = ${params.next()}`;
  });

  return {
    sql: `SELECT * FROM ${table} WHERE ${predicates.join(' AND ')}`,
    args: entries.map(([, value]) => value),
  };
}

/**
 * Multi-row insert. Placeholders run on across rows: with N columns, row i
 * takes `$((i-1)*N+1)` to `$(i*N)`.
 */
export function buildInsert(
  table: string,
  columns: readonly string[],
  valueTuples: readonly ValueTuple[],
  options: InsertOptions = {},
): BuiltQuery {
  validateTableName(table);

  if (columns.length === 0) {
    throw new ValidationError('Insert requires at least one column', 'columns');
  }
  columns.forEach(validateColumnName);

  if (valueTuples.length === 0) {
    throw new ValidationError('Insert requires at least one row of values', 'valueTuples');
  }

  valueTuples.forEach((tuple, index) => {
    if (tuple.length !== columns.length) {
      throw new ValidationError(
        `Row ${index + 1} has ${tuple.length} values but ${columns.length} columns were given`,
        'valueTuples',
      );
    }
  });

  const params = new ParameterSequence();
  const groups = valueTuples.map((tuple) => `(${tuple.map(() => params.next()).join(', ')})`);

  let sql = `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${groups.join(', ')}`;

  if (options.onConflict !== undefined) {
    const clause = options.onConflict.trim();
    if (!clause) {
      throw new ValidationError('Conflict clause must not be empty', 'onConflict');
    }
    sql += ` ON CONFLICT ${clause}`;
  }

  if (options.returning !== undefined) {
    validateReturningColumn(options.returning);
    sql += ` RETURNING ${options.returning}`;
  }

  return { sql, args: valueTuples.flat() };
}
