import type { ConnectionOptions } from 'node:tls';

/**
 * Scalar value bound to a positional parameter.
 */
export type SqlValue = string | number | bigint | boolean | Date | Buffer | null;

/**
 * One `[column, value]` pair of a row.
 */
export type RowEntry = readonly [column: string, value: SqlValue];

/**
 * A row as an ordered list of column/value pairs. The order decides the
 * order of the generated placeholders.
 */
export type RowEntries = readonly RowEntry[];

/**
 * Rows are accepted either as ordered entries or as plain objects, which are
 * read in key iteration order.
 */
export type RowInput = RowEntries | Readonly<Record<string, SqlValue>>;

export type ValueTuple = readonly SqlValue[];

/**
 * A row as returned by the database.
 */
export type ResultRow = Record<string, unknown>;

export interface BuiltQuery {
  sql: string;
  args: SqlValue[];
}

export interface InsertOptions {
  /** Raw conflict action appended after `ON CONFLICT`, e.g. `DO NOTHING` */
  onConflict?: string;
  /** Column named in the `RETURNING` clause */
  returning?: string;
}

/**
 * Database connection configuration
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'importer',
 *   database: 'catalog',
 * };
 * ```
 */
export interface ConnectionConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean | ConnectionOptions;
  connectionTimeout?: number;
}

/**
 * A connection URI or a structured configuration.
 */
export type SessionTarget = string | ConnectionConfig;

export type SessionState = 'idle' | 'open' | 'closed';

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
