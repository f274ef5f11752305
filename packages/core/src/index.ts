export * from './types';
export * from './interfaces';
export * from './errors';
export * from './utils';
export * from './query';
export * from './session';
export {
  DEFAULT_SCHEME,
  registerConnector,
  unregisterConnector,
  resolveConnector,
} from './connector-registry';
export type { ConnectorFactory } from './connector-registry';
