import type { RowEntries, RowEntry, RowInput, SqlValue } from '../types';

function isRowEntries(row: RowInput): row is RowEntries {
  return Array.isArray(row);
}

/**
 * Normalise a row to ordered `[column, value]` pairs. Plain objects are read
 * in key iteration order.
 */
export function toRowEntries(row: RowInput): RowEntry[] {
  if (isRowEntries(row)) {
    return [...row];
  }
  return Object.entries(row);
}

/**
 * Split a row into a column list and the matching value tuple.
 */
export function splitRow(row: RowInput): { columns: string[]; values: SqlValue[] } {
  const columns: string[] = [];
  const values: SqlValue[] = [];

  for (const [column, value] of toRowEntries(row)) {
    columns.push(column);
    values.push(value);
  }

  return { columns, values };
}

export function findRowEntry(row: RowInput, column: string): RowEntry | undefined {
  return toRowEntries(row).find(([name]) => name === column);
}
