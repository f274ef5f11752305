export * from './validation';
export * from './logger';
export * from './connection-config';
