export { Session, withSession, CONFLICT_DO_NOTHING } from './session';
export type { SessionOptions, SessionEvents, StatementEvent } from './session';
export { IntegrityCache } from './integrity-cache';
export { BulkInserter, DEFAULT_BATCH_SIZE } from './bulk-inserter';
export type { BulkInserterOptions } from './bulk-inserter';
