import { types } from 'pg';

import type { ConnectionConfig } from '@pgsession/core';
import type { ClientConfig } from 'pg';

/**
 * Map a session target onto `pg.Client` options. `overrides` win.
 */
export function toClientConfig(config: ConnectionConfig, overrides: ClientConfig = {}): ClientConfig {
  const clientConfig: ClientConfig = {};

  if (config.connectionString) {
    clientConfig.connectionString = config.connectionString;
  } else {
    clientConfig.host = config.host;
    clientConfig.port = config.port ?? 5432;
    clientConfig.database = config.database;
    clientConfig.user = config.user;
    clientConfig.password = config.password;
  }

  if (config.ssl !== undefined) {
    clientConfig.ssl = config.ssl;
  }

  if (config.connectionTimeout !== undefined) {
    clientConfig.connectionTimeoutMillis = config.connectionTimeout;
  }

  return { ...clientConfig, ...overrides };
}

let int8ParserInstalled = false;

/**
 * Parse BIGINT columns (serial8 ids, counts) to numbers when they fit in a
 * safe integer, and keep them as strings otherwise. The parser is global to
 * `pg`, so it is installed once per process.
 */
export function installInt8Parser(): void {
  if (int8ParserInstalled) {
    return;
  }

  types.setTypeParser(types.builtins.INT8, (val: string) => {
    const num = Number.parseInt(val, 10);
    return Number.isSafeInteger(num) ? num : val;
  });
  int8ParserInstalled = true;
}
