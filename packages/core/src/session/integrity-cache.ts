import { SessionStateError, ValidationError } from '../errors';
import { buildLookup } from '../query/query-builder';
import { findRowEntry, toRowEntries } from '../query/row';

import type { RowInput, SqlValue } from '../types';
import type { Session } from './session';

/**
 * Process-local record of key values known to exist per table, used to skip
 * repeated find-or-create round-trips for the same key.
 *
 * Keys are reserved just before the database call and never released, so a
 * failed create is not retried through the same cache. Input and usage
 * errors are raised before anything is reserved. Nothing is shared
 * between instances or persisted; create one per unit of work.
 */
export class IntegrityCache {
  private readonly store = new Map<string, Set<string>>();

  /**
   * Find or create `row` unless its `keyField` value was already seen for
   * `table`. Resolves to `true` when the database was consulted.
   */
  async create(session: Session, table: string, row: RowInput, keyField = 'id'): Promise<boolean> {
    const entries = toRowEntries(row);
    const keyEntry = findRowEntry(entries, keyField);
    if (!keyEntry) {
      throw new ValidationError(`Missing ${keyField} field in row`, keyField);
    }

    const keys = this.keysFor(table);
    const key = encodeKey(keyEntry[1]);
    if (keys.has(key)) {
      return false;
    }

    if (!session.isOpen) {
      throw new SessionStateError(
        `Session is ${session.state}; queries need an open session`,
        session.state,
      );
    }
    buildLookup(table, entries);

    keys.add(key);
    await session.conditionalCreate(table, entries);
    return true;
  }

  has(table: string, value: SqlValue): boolean {
    return this.store.get(table)?.has(encodeKey(value)) ?? false;
  }

  /**
   * Number of recorded keys for one table, or across all tables.
   */
  size(table?: string): number {
    if (table !== undefined) {
      return this.store.get(table)?.size ?? 0;
    }
    let total = 0;
    for (const keys of this.store.values()) {
      total += keys.size;
    }
    return total;
  }

  private keysFor(table: string): Set<string> {
    let keys = this.store.get(table);
    if (!keys) {
      keys = new Set();
      this.store.set(table, keys);
    }
    return keys;
  }
}

/**
 * Type-tagged string form of a key, so that equal dates and buffers match
 * by value and `1` never matches `'1'`.
 */
function encodeKey(value: SqlValue): string {
  if (value === null) {
    return 'null';
  }
  if (value instanceof Date) {
    return `date:${value.getTime()}`;
  }
  if (Buffer.isBuffer(value)) {
    return `bytes:${value.toString('hex')}`;
  }
  return `${typeof value}:${String(value)}`;
}
