export { Database, openConfiguredDatabase } from './database.js';
export { DatabaseFormat } from './databaseFormat.js';
export { createEntry, Entries, entryKey, isSameEntry, type Entry } from './entry.js';
export {
  CompilationDatabaseError,
  isCompilationDatabaseError,
  type CompilationDatabaseErrorCode,
} from './errors.js';
export { fromEntry, intoEntry, parseWireRecord, parseWireRecords, toJsonObject } from './wireRecord.js';
export type {
  ArrayEntry,
  ArrayEntryJson,
  StringEntry,
  StringEntryJson,
  WireRecord,
  WireRecordJson,
} from './wireTypes.js';
