import { ConfigurationError } from './errors';
import { targetScheme } from './utils/connection-config';

import type { DatabaseConnector } from './interfaces';
import type { ConnectionConfig, Logger } from './types';

/**
 * Scheme assumed for structured configurations without a connection string.
 */
export const DEFAULT_SCHEME = 'postgresql';

/**
 * Builds a connector for a scheme. The connection target reaches the
 * connector later, through `connect`.
 */
export interface ConnectorFactory {
  createConnector(logger: Logger): DatabaseConnector;
}

const connectorFactories = new Map<string, ConnectorFactory>();

/**
 * Register a connector factory for a URI scheme (`postgres`, `postgresql`, ...)
 */
export function registerConnector(scheme: string, factory: ConnectorFactory): void {
  connectorFactories.set(scheme.toLowerCase(), factory);
}

export function unregisterConnector(scheme: string): boolean {
  return connectorFactories.delete(scheme.toLowerCase());
}

/**
 * Create a connector for the target using the factory registered for its
 * scheme.
 */
export function resolveConnector(config: ConnectionConfig, logger: Logger): DatabaseConnector {
  const scheme = targetScheme(config) ?? DEFAULT_SCHEME;
  const factory = connectorFactories.get(scheme);

  if (!factory) {
    throw new ConfigurationError(
      `No connector registered for scheme: ${scheme}. ` +
        `Make sure you've imported the driver package.`,
      'connector',
    );
  }

  return factory.createConnector(logger);
}
