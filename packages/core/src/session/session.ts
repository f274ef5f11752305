/**
 * Session
 *
 * Owns one live connection for the length of a scope and runs the
 * find-or-create and insert helpers on it.
 *
 * @example
 * ```typescript
 * await withSession('postgresql://importer@localhost/catalog', async (session) => {
 *   const id = await session.conditionalCreate('people', { name: 'Nano', age: 33 }, 'id');
 *   await session.insertOrIgnore('tags', ['person_id', 'tag'], [[id, 'staff']]);
 * });
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { resolveConnector } from '../connector-registry';
import { SessionStateError, ValidationError } from '../errors';
import { buildInsert, buildLookup } from '../query/query-builder';
import { splitRow, toRowEntries } from '../query/row';
import { describeTarget, normalizeTarget } from '../utils/connection-config';
import { consoleLogger, describeError } from '../utils/logger';
import { validateConnectionConfig } from '../utils/validation';

import type { ConnectionHandle, DatabaseConnector } from '../interfaces';
import type {
  ConnectionConfig,
  InsertOptions,
  Logger,
  ResultRow,
  RowInput,
  SessionState,
  SessionTarget,
  SqlValue,
  ValueTuple,
} from '../types';

export interface SessionOptions {
  logger?: Logger;
  /** Overrides the connector registered for the target's scheme */
  connector?: DatabaseConnector;
}

export interface StatementEvent {
  sql: string;
  args: readonly SqlValue[];
  duration: number;
}

export interface SessionEvents {
  open: (event: { target: string }) => void;
  close: (event: { target: string }) => void;
  query: (event: StatementEvent) => void;
  queryError: (event: StatementEvent & { error: unknown }) => void;
}

export const CONFLICT_DO_NOTHING = 'DO NOTHING';

export class Session extends EventEmitter<SessionEvents> {
  private readonly config: ConnectionConfig;
  private readonly logger: Logger;
  private readonly connector?: DatabaseConnector;
  private handle?: ConnectionHandle;
  private _state: SessionState = 'idle';

  constructor(target: SessionTarget, options: SessionOptions = {}) {
    super();
    this.config = normalizeTarget(target);
    this.logger = options.logger ?? consoleLogger;
    this.connector = options.connector;
  }

  get state(): SessionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'open';
  }

  /** The connection target with any password masked */
  get target(): string {
    return describeTarget(this.config);
  }

  /**
   * Acquire the connection. A session opens once; a failed attempt leaves it
   * idle.
   */
  async open(): Promise<this> {
    if (this._state !== 'idle') {
      throw new SessionStateError(`Cannot open a session that is ${this._state}`, this._state);
    }

    validateConnectionConfig(this.config);
    const connector = this.connector ?? resolveConnector(this.config, this.logger);

    try {
      this.handle = await connector.connect(this.config);
    } catch (error) {
      this.logger.error('Failed to open session', { target: this.target, ...describeError(error) });
      throw error;
    }

    this._state = 'open';
    this.logger.info('Session opened', { target: this.target });
    this.emit('open', { target: this.target });
    return this;
  }

  /**
   * Release the connection. When the scope failed, pass its error: it is
   * logged first, and a failure to release is then logged instead of thrown
   * so the scope's error stays the one that propagates.
   */
  async close(error?: unknown): Promise<void> {
    await this.release(error !== undefined, error);
  }

  /**
   * Run `body` with the session open, releasing the connection on every
   * exit path. Errors from `body` are logged and re-thrown unchanged.
   */
  async run<T>(body: (session: this) => Promise<T>): Promise<T> {
    await this.open();

    let result: T;
    try {
      result = await body(this);
    } catch (error) {
      await this.release(true, error);
      throw error;
    }

    await this.release(false);
    return result;
  }

  /**
   * Find a row equal to `row` on every column, inserting it when there is
   * none. On a hit the returned columns are laid over a copy of `row` and
   * `returnColumn` is read from that; `row` itself is left untouched.
   */
  async conditionalCreate(table: string, row: RowInput, returnColumn?: string): Promise<unknown> {
    const handle = this.requireHandle();
    const entries = toRowEntries(row);
    if (entries.length === 0) {
      throw new ValidationError('Cannot find or create an empty row', 'row');
    }

    const lookup = buildLookup(table, entries);
    const sql = `${lookup.sql} LIMIT 1`;
    const existing = await this.track(sql, lookup.args, () => handle.fetchRow(sql, lookup.args));

    if (!existing) {
      return this.insertOne(table, entries, returnColumn ?? null);
    }

    if (returnColumn === undefined) {
      return undefined;
    }

    const merged: ResultRow = { ...Object.fromEntries(entries), ...existing };
    return merged[returnColumn];
  }

  /**
   * Insert a single row. Pass `null` as `returnColumn` to skip `RETURNING`.
   */
  async insertOne(table: string, row: RowInput, returnColumn: string | null = 'id'): Promise<unknown> {
    this.requireHandle();
    const { columns, values } = splitRow(row);
    if (columns.length === 0) {
      throw new ValidationError('Cannot insert an empty row', 'row');
    }

    return this.insert(table, columns, [values], returnColumn === null ? {} : { returning: returnColumn });
  }

  /**
   * One `INSERT` statement for all tuples, run in its own transaction.
   * Resolves to the first returned value when `options.returning` is set.
   */
  async insert(
    table: string,
    columns: readonly string[],
    valueTuples: readonly ValueTuple[],
    options: InsertOptions = {},
  ): Promise<unknown> {
    const handle = this.requireHandle();
    const { sql, args } = buildInsert(table, columns, valueTuples, options);

    const value = await this.track(sql, args, () =>
      handle.runInTransaction(() => handle.fetchValue(sql, args)),
    );

    return options.returning === undefined ? undefined : value;
  }

  /**
   * Insert the tuples, skipping any that hit a conflict.
   */
  async insertOrIgnore(
    table: string,
    columns: readonly string[],
    valueTuples: readonly ValueTuple[],
  ): Promise<void> {
    await this.insert(table, columns, valueTuples, { onConflict: CONFLICT_DO_NOTHING });
  }

  private async release(scopeFailed: boolean, error?: unknown): Promise<void> {
    if (scopeFailed) {
      this.logger.error('Session scope failed', { target: this.target, ...describeError(error) });
    }

    const handle = this.handle;
    this.handle = undefined;
    this._state = 'closed';

    if (!handle) {
      return;
    }

    try {
      await handle.close();
    } catch (closeError) {
      if (!scopeFailed) {
        throw closeError;
      }
      this.logger.error('Failed to release connection', {
        target: this.target,
        ...describeError(closeError),
      });
    }

    this.logger.info('Session closed', { target: this.target });
    this.emit('close', { target: this.target });
  }

  private requireHandle(): ConnectionHandle {
    if (this._state !== 'open' || !this.handle) {
      throw new SessionStateError(
        `Session is ${this._state}; queries need an open session`,
        this._state,
      );
    }
    return this.handle;
  }

  private async track<T>(sql: string, args: readonly SqlValue[], run: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    this.logger.debug('Executing statement', { sql, params: args.length });

    try {
      const result = await run();
      this.emit('query', { sql, args, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.emit('queryError', { sql, args, error, duration: Date.now() - startTime });
      throw error;
    }
  }
}

/**
 * Open a session on `target`, run `body`, and release the connection
 * whatever the outcome.
 */
export async function withSession<T>(
  target: SessionTarget,
  body: (session: Session) => Promise<T>,
  options: SessionOptions = {},
): Promise<T> {
  return new Session(target, options).run(body);
}
