import { registerConnector } from '@pgsession/core';

import { PgConnector } from './connection/pg-connector';

export const PG_SCHEMES = ['postgresql', 'postgres'] as const;

/**
 * Register the `pg` connector for `postgresql://` and `postgres://` targets
 * (and for structured configurations, which default to `postgresql`).
 */
export function registerPgConnector(): void {
  for (const scheme of PG_SCHEMES) {
    registerConnector(scheme, {
      createConnector(logger) {
        return new PgConnector({ logger });
      },
    });
  }
}

registerPgConnector();
