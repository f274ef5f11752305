import { ValidationError } from '../errors';
import { validateBatchSize, validateColumnName, validateTableName } from '../utils/validation';

import type { ValueTuple } from '../types';
import type { Session } from './session';

export const DEFAULT_BATCH_SIZE = 1000;

export interface BulkInserterOptions {
  batchSize?: number;
}

/**
 * Bulk Inserter
 *
 * Buffers value tuples for one table and writes them as a single
 * `INSERT ... ON CONFLICT DO NOTHING` once `batchSize` tuples are pending.
 * The trailing partial batch is only written by an explicit `flush()`.
 *
 * @example
 * ```typescript
 * const inserter = new BulkInserter(session, 'readings', ['sensor', 'value'], { batchSize: 500 });
 * for (const reading of readings) {
 *   await inserter.add([reading.sensor, reading.value]);
 * }
 * await inserter.flush();
 * ```
 */
export class BulkInserter {
  readonly columns: readonly string[];
  readonly batchSize: number;

  private readonly buffer: ValueTuple[] = [];
  private _flushCount = 0;
  private _insertedRows = 0;

  constructor(
    private readonly session: Session,
    readonly table: string,
    columns: readonly string[],
    options: BulkInserterOptions = {},
  ) {
    validateTableName(table);
    if (columns.length === 0) {
      throw new ValidationError('Bulk insert requires at least one column', 'columns');
    }
    columns.forEach(validateColumnName);

    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    validateBatchSize(this.batchSize);
    this.columns = [...columns];
  }

  /** Tuples waiting for the next flush */
  get pending(): number {
    return this.buffer.length;
  }

  /** Number of INSERT statements issued so far */
  get flushCount(): number {
    return this._flushCount;
  }

  /**
   * Tuples sent to the database so far, including any it skipped on conflict
   */
  get insertedRows(): number {
    return this._insertedRows;
  }

  /**
   * Buffer a copy of one tuple, flushing before resolving when the batch is full.
   */
  async add(tuple: ValueTuple): Promise<void> {
    if (tuple.length !== this.columns.length) {
      throw new ValidationError(
        `Expected ${this.columns.length} values but got ${tuple.length}`,
        'tuple',
      );
    }

    this.buffer.push([...tuple]);
    if (this.buffer.length >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Write every buffered tuple in one statement. The buffer is only cleared
   * once the statement succeeded.
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }

    const batch = this.buffer.slice();
    await this.session.insertOrIgnore(this.table, this.columns, batch);

    this.buffer.splice(0, batch.length);
    this._flushCount += 1;
    this._insertedRows += batch.length;
  }
}
