import type { ConnectionConfig, ResultRow, SqlValue } from '../types';

/**
 * A single live connection. Implementations are not expected to support
 * more than one statement in flight at a time.
 */
export interface ConnectionHandle {
  fetchRow(sql: string, args: readonly SqlValue[]): Promise<ResultRow | undefined>;

  /**
   * First column of the first result row, or `undefined` when there is none.
   */
  fetchValue(sql: string, args: readonly SqlValue[]): Promise<unknown>;

  runInTransaction<T>(body: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

export interface DatabaseConnector {
  connect(config: ConnectionConfig): Promise<ConnectionHandle>;
}
