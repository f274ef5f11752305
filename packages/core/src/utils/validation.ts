import { ValidationError } from '../errors';

import type { ConnectionConfig } from '../types';

const IDENTIFIER = '[a-zA-Z_][a-zA-Z0-9_$]*';
const TABLE_NAME_REGEX = new RegExp(`^${IDENTIFIER}(\\.${IDENTIFIER})?$`);
const COLUMN_NAME_REGEX = new RegExp(`^${IDENTIFIER}$`);

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config.connectionString) {
    if (!config.host) {
      throw new ValidationError('Host is required when connectionString is not provided', 'host');
    }

    if (!config.database) {
      throw new ValidationError(
        'Database name is required when connectionString is not provided',
        'database',
      );
    }
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)
  ) {
    throw new ValidationError('Port must be a number between 1 and 65535', 'port');
  }

  if (config.connectionTimeout !== undefined && config.connectionTimeout < 0) {
    throw new ValidationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }
}

/**
 * Table names may be schema-qualified (`schema.table`).
 */
export function validateTableName(tableName: string): void {
  if (!tableName) {
    throw new ValidationError('Table name must be a non-empty string', 'table');
  }

  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new ValidationError(
      `Invalid table name "${tableName}": expected an identifier, optionally schema-qualified`,
      'table',
    );
  }
}

export function validateColumnName(columnName: string): void {
  if (!columnName) {
    throw new ValidationError('Column name must be a non-empty string', 'columns');
  }

  if (!COLUMN_NAME_REGEX.test(columnName)) {
    throw new ValidationError(
      `Invalid column name "${columnName}": expected a letter or underscore followed by letters, digits, underscores or $`,
      'columns',
    );
  }
}

export function validateReturningColumn(columnName: string): void {
  if (columnName === '*') {
    return;
  }
  validateColumnName(columnName);
}

export function validateBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError('Batch size must be a positive integer', 'batchSize');
  }
}
