/**
 * Sync module - change records, journal, merge and relay exchange
 * @module sync
 */

export {
  PREFS_DATASET,
  createChangeRecord,
  isVariant,
  cellKey,
  compareRecords,
  type ChangeRecord,
  type ChangeInput,
} from './change-record.js';

export { ChangeBuffer, type PendingEdit } from './change-buffer.js';

export {
  MessageJournal,
  type JournalEntry,
  type JournalStats,
  type RecordOutcome,
} from './message-journal.js';

export { MergeApplier, type ApplyOptions, type ApplyResult } from './merge-applier.js';

export type { RelayTransport, RelayAck, ReplaceAck, Backlog, KeyRegistry, RegisteredKey } from './relay.js';

export { InMemoryRelay, type RelayCallCounts } from './in-memory-relay.js';

export {
  SyncSession,
  GROUP_ID_KEY,
  ENCRYPT_KEY_ID_KEY,
  type SyncSessionOptions,
  type SyncOptions,
  type SyncResult,
  type SendResult,
} from './sync-session.js';
