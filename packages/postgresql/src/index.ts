import { Session, consoleLogger } from '@pgsession/core';

import { PgConnector } from './connection/pg-connector';

import type { SessionOptions, SessionTarget } from '@pgsession/core';
import type { PgConnectorOptions } from './connection/pg-connector';

export { PgConnection } from './connection/pg-connection';
export { PgConnector } from './connection/pg-connector';
export type { PgConnectorOptions } from './connection/pg-connector';
export { registerPgConnector, PG_SCHEMES } from './register';
export { toClientConfig, installInt8Parser } from './utils/pg-utils';

export interface PgSessionOptions
  extends Omit<SessionOptions, 'connector'>,
    Omit<PgConnectorOptions, 'logger'> {}

/**
 * Session bound to the `pg` connector, whatever the target's scheme.
 */
export function createPgSession(target: SessionTarget, options: PgSessionOptions = {}): Session {
  const logger = options.logger ?? consoleLogger;
  return new Session(target, {
    logger,
    connector: new PgConnector({
      logger,
      clientConfig: options.clientConfig,
      parseInt8: options.parseInt8,
    }),
  });
}

export {
  Session,
  withSession,
  IntegrityCache,
  BulkInserter,
} from '@pgsession/core';
export type {
  ConnectionConfig,
  ConnectionHandle,
  DatabaseConnector,
  Logger,
  RowInput,
  SessionTarget,
  SqlValue,
  ValueTuple,
} from '@pgsession/core';
