/**
 * Storage facade.
 */
export { JsonStore, type RecordParser } from './json-store.js';
export { JsonlLedgerStore, LedgerEntrySchema, type LedgerVerification } from './ledger-log.js';
export {
  QueryStore, QueryRecordSchema, recordFromResult, recordFromFailure,
  type QueryRecord, type QueryFailure,
} from './queries.js';
