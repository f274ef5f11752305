import type { ConnectionHandle, Logger, ResultRow, SqlValue } from '@pgsession/core';
import type { Client } from 'pg';

/**
 * Connection handle over one `pg.Client`.
 */
export class PgConnection implements ConnectionHandle {
  constructor(
    private readonly client: Client,
    private readonly logger: Logger,
  ) {}

  async fetchRow(sql: string, args: readonly SqlValue[]): Promise<ResultRow | undefined> {
    const result = await this.client.query<ResultRow>(sql, [...args]);
    return result.rows.at(0);
  }

  async fetchValue(sql: string, args: readonly SqlValue[]): Promise<unknown> {
    const result = await this.client.query<unknown[]>({
      text: sql,
      values: [...args],
      rowMode: 'array',
    });
    return result.rows.at(0)?.at(0);
  }

  async runInTransaction<T>(body: () => Promise<T>): Promise<T> {
    await this.client.query('BEGIN');

    let result: T;
    try {
      result = await body();
    } catch (error) {
      await this.rollback();
      throw error;
    }

    await this.client.query('COMMIT');
    return result;
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private async rollback(): Promise<void> {
    try {
      await this.client.query('ROLLBACK');
    } catch (rollbackError) {
      this.logger.warn('Failed to roll back transaction', rollbackError);
    }
  }
}
