import { Client } from 'pg';

import { toClientConfig, installInt8Parser } from '../utils/pg-utils';
import { PgConnection } from './pg-connection';

import type { ConnectionConfig, DatabaseConnector, Logger } from '@pgsession/core';
import type { ClientConfig } from 'pg';

export interface PgConnectorOptions {
  logger: Logger;
  /** Extra `pg.Client` options, applied over the session target */
  clientConfig?: ClientConfig;
  /** Parse BIGINT columns to numbers when safe (default: true) */
  parseInt8?: boolean;
}

/**
 * Opens one dedicated `pg.Client` per session. No pooling.
 */
export class PgConnector implements DatabaseConnector {
  private readonly logger: Logger;
  private readonly clientConfig?: ClientConfig;

  constructor(options: PgConnectorOptions) {
    this.logger = options.logger;
    this.clientConfig = options.clientConfig;

    if (options.parseInt8 ?? true) {
      installInt8Parser();
    }
  }

  async connect(config: ConnectionConfig): Promise<PgConnection> {
    const client = new Client(toClientConfig(config, this.clientConfig));

    client.on('error', (err) => {
      this.logger.error('Unexpected error on PostgreSQL client', err);
    });

    await client.connect();
    this.logger.debug('Connected to PostgreSQL', { database: config.database });
    return new PgConnection(client, this.logger);
  }
}
