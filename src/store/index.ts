export { MemoryRecordStore, type MemoryRecordStoreOptions } from './memory-record-store.js';
export { FileRecordStore, type FileRecordStoreOptions } from './file-record-store.js';
export { STATUS_ALIASES, parseStatus, isStatusAlias } from './status-vocabulary.js';
export type { RowTables } from './tables.js';
