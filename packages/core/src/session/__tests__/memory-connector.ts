import type { ConnectionHandle, DatabaseConnector } from '../../interfaces';
import type { ConnectionConfig, ResultRow, SqlValue } from '../../types';

const LOOKUP_REGEX = /^SELECT \* FROM (\S+) WHERE (.+) LIMIT 1$/;
const INSERT_REGEX =
  /^INSERT INTO (\S+) \(([^)]*)\) VALUES (.+?)(?: ON CONFLICT (.+?))?(?: RETURNING (\S+))?$/;

export interface RecordedStatement {
  method: 'fetchRow' | 'fetchValue';
  sql: string;
  args: SqlValue[];
}

/**
 * In-memory stand-in for a PostgreSQL database that understands the lookup
 * and insert statements the session generates. Every table has a serial
 * `id` column and a unique constraint on it.
 */
export class MemoryDatabase {
  readonly statements: RecordedStatement[] = [];
  transactions = 0;
  opened = 0;
  closed = 0;
  /** Rejects the next statement with this error */
  failNext?: Error;

  private readonly tables = new Map<string, ResultRow[]>();
  private nextId = 1;

  rows(table: string): ResultRow[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  seed(table: string, row: ResultRow): ResultRow {
    const stored = { id: this.nextId++, ...row };
    this.rows(table).push(stored);
    return stored;
  }

  lookup(sql: string, args: SqlValue[]): ResultRow | undefined {
    this.record('fetchRow', sql, args);
    const match = LOOKUP_REGEX.exec(sql);
    if (!match) {
      throw new Error(`Unsupported statement: ${sql}`);
    }

    const columns = match[2].split(' AND ').map((term) => term.split(' = ')[0]);
    return this.rows(match[1]).find((row) =>
      columns.every((column, index) => row[column] === args[index]),
    );
  }

  insert(sql: string, args: SqlValue[]): unknown {
    this.record('fetchValue', sql, args);
    const match = INSERT_REGEX.exec(sql);
    if (!match) {
      throw new Error(`Unsupported statement: ${sql}`);
    }

    const [, table, columnList, , onConflict, returning] = match;
    const columns = columnList.split(', ');
    const rows = this.rows(table);
    const inserted: ResultRow[] = [];

    for (let offset = 0; offset < args.length; offset += columns.length) {
      const row: ResultRow = {};
      columns.forEach((column, index) => {
        row[column] = args[offset + index];
      });

      if (row['id'] !== undefined && rows.some((existing) => existing['id'] === row['id'])) {
        if (onConflict === 'DO NOTHING') {
          continue;
        }
        throw new Error(`duplicate key value violates unique constraint "${table}_pkey"`);
      }

      const stored = { id: this.nextId++, ...row };
      rows.push(stored);
      inserted.push(stored);
    }

    return returning === undefined ? undefined : inserted[0]?.[returning];
  }

  private record(method: RecordedStatement['method'], sql: string, args: SqlValue[]): void {
    this.statements.push({ method, sql, args });
    const failure = this.failNext;
    if (failure) {
      this.failNext = undefined;
      throw failure;
    }
  }
}

class MemoryConnection implements ConnectionHandle {
  constructor(private readonly db: MemoryDatabase) {}

  async fetchRow(sql: string, args: readonly SqlValue[]): Promise<ResultRow | undefined> {
    return this.db.lookup(sql, [...args]);
  }

  async fetchValue(sql: string, args: readonly SqlValue[]): Promise<unknown> {
    return this.db.insert(sql, [...args]);
  }

  async runInTransaction<T>(body: () => Promise<T>): Promise<T> {
    this.db.transactions += 1;
    return body();
  }

  async close(): Promise<void> {
    this.db.closed += 1;
  }
}

export class MemoryConnector implements DatabaseConnector {
  readonly configs: ConnectionConfig[] = [];

  constructor(readonly db: MemoryDatabase = new MemoryDatabase()) {}

  async connect(config: ConnectionConfig): Promise<ConnectionHandle> {
    this.configs.push(config);
    this.db.opened += 1;
    return new MemoryConnection(this.db);
  }
}
