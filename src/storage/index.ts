/**
 * Storage Layer Export
 *
 * LevelDB-backed replica state
 *
 * @module storage
 */

export {
  ReplicaDatabase,
  KeyValueTransaction,
  type KeyValueStore,
  type ReplicaDatabaseOptions,
} from './database.js';

export {
  SchemaRegistry,
  LEDGER_DATASETS,
  type ColumnType,
  type ColumnDef,
  type DatasetDeclaration,
  type LedgerDataset,
} from './schema.js';

export { LedgerStore, isLive } from './ledger-store.js';

export { MetadataStore, META_DOCUMENT, PREFS_DOCUMENT, type MetadataDocument } from './metadata-store.js';
