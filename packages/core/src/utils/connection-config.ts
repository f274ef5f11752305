import { ConfigurationError } from '../errors';

import type { ConnectionConfig, SessionTarget } from '../types';

const SCHEME_REGEX = /^([a-z][a-z0-9+.-]*):/i;
const URI_PASSWORD_REGEX = /^([a-z][a-z0-9+.-]*:\/\/[^:/@]+:)[^@]*@/i;

export function normalizeTarget(target: SessionTarget): ConnectionConfig {
  if (typeof target === 'string') {
    return { connectionString: target };
  }
  return { ...target };
}

/**
 * Read the connection from `DATABASE_URL`, falling back to the libpq
 * `PG*` variables.
 */
export function connectionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionConfig {
  if (env['DATABASE_URL']) {
    return { connectionString: env['DATABASE_URL'] };
  }

  if (!env['PGHOST'] && !env['PGDATABASE']) {
    throw new ConfigurationError(
      'No database connection configured: set DATABASE_URL or PGHOST and PGDATABASE',
      'DATABASE_URL',
    );
  }

  const config: ConnectionConfig = {
    host: env['PGHOST'],
    database: env['PGDATABASE'],
  };

  if (env['PGPORT']) {
    const port = Number(env['PGPORT']);
    if (!Number.isInteger(port)) {
      throw new ConfigurationError(`PGPORT must be an integer, got "${env['PGPORT']}"`, 'PGPORT');
    }
    config.port = port;
  }
  if (env['PGUSER']) {
    config.user = env['PGUSER'];
  }
  if (env['PGPASSWORD']) {
    config.password = env['PGPASSWORD'];
  }

  return config;
}

/**
 * URI scheme of the target (lower-cased), when it is given as a connection
 * string.
 */
export function targetScheme(config: ConnectionConfig): string | undefined {
  if (!config.connectionString) {
    return undefined;
  }
  return SCHEME_REGEX.exec(config.connectionString)?.[1]?.toLowerCase();
}

/**
 * Render a target for logs, with any password masked.
 */
export function describeTarget(config: ConnectionConfig): string {
  if (config.connectionString) {
    return config.connectionString.replace(URI_PASSWORD_REGEX, '$1***@');
  }

  const credentials = config.user ? `${config.user}${config.password ? ':***' : ''}@` : '';
  const port = config.port ? `:${config.port}` : '';
  return `${credentials}${config.host ?? ''}${port}/${config.database ?? ''}`;
}
