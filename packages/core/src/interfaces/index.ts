export type { ConnectionHandle, DatabaseConnector } from './database-connector';
