/**
 * Merge Applier - writes ordered ChangeRecords into the local store
 *
 * Consecutive records for the same (dataset, row) are folded into one row
 * update. Every record first passes through the message journal, which drops
 * duplicates and records older than the cell's current writer, so applying
 * the same batch twice leaves the store as it was after the first time.
 *
 * @module sync/merge-applier
 */

import type { Attributes } from '../types/index.js';
import type { KeyValueStore, ReplicaDatabase } from '../storage/database.js';
import type { SchemaRegistry } from '../storage/schema.js';
import { LedgerStore } from '../storage/ledger-store.js';
import { MetadataStore, PREFS_DOCUMENT } from '../storage/metadata-store.js';
import { MessageJournal } from './message-journal.js';
import { PREFS_DATASET, type ChangeRecord } from './change-record.js';
import { syncLogger } from '../utils/logger.js';

export interface ApplyOptions {
  /** Mark the records as local edits awaiting send */
  outbox?: boolean;
}

/**
 * Result of applying a batch
 */
export interface ApplyResult {
  /** Records that now own their cell */
  applied: number;
  /** Records older than the cell's current writer */
  stale: number;
  /** Records journaled before */
  duplicates: number;
  /** Applied records routed to the prefs document */
  prefs: number;
  /** Row updates issued after grouping */
  rowWrites: number;
}

interface PendingGroup {
  dataset: string;
  row: string;
  attrs: Attributes;
}

export class MergeApplier {
  constructor(
    private readonly db: ReplicaDatabase,
    private readonly schema: SchemaRegistry
  ) {}

  /**
   * Check every identifier before anything is written.
   *
   * @throws {UnsupportedSchemaError} for an undeclared dataset or column
   */
  private validate(records: readonly ChangeRecord[]): void {
    for (const record of records) {
      if (record.dataset === PREFS_DATASET) continue;
      this.schema.requireColumn(record.dataset, record.column);
    }
  }

  /**
   * Apply `records` in order as one atomic transaction
   */
  async apply(records: readonly ChangeRecord[], options: ApplyOptions = {}): Promise<ApplyResult> {
    return this.db.transaction((tx) => this.applyIn(tx, records, options));
  }

  /**
   * Apply inside a caller-owned transaction, so the caller can commit other
   * state (the replica clock) in the same batch.
   */
  async applyIn(
    kv: KeyValueStore,
    records: readonly ChangeRecord[],
    options: ApplyOptions = {}
  ): Promise<ApplyResult> {
    this.validate(records);

    const ledger = new LedgerStore(kv, this.schema);
    const prefs = new MetadataStore(kv, PREFS_DOCUMENT);
    const journal = new MessageJournal(kv);
    const result: ApplyResult = { applied: 0, stale: 0, duplicates: 0, prefs: 0, rowWrites: 0 };

    let group: PendingGroup | null = null;
    const flush = async (): Promise<void> => {
      if (group && Object.keys(group.attrs).length > 0) {
        await ledger.update(group.dataset, group.row, group.attrs);
        result.rowWrites++;
      }
      group = null;
    };

    for (const record of records) {
      const outcome = await journal.record(record, { outbox: options.outbox });
      if (outcome === 'duplicate') {
        result.duplicates++;
        continue;
      }
      if (outcome === 'stale') {
        result.stale++;
        continue;
      }
      result.applied++;

      if (record.dataset === PREFS_DATASET) {
        await prefs.patch({ [record.row]: record.value });
        result.prefs++;
        continue;
      }

      if (group === null || group.dataset !== record.dataset || group.row !== record.row) {
        await flush();
        group = { dataset: record.dataset, row: record.row, attrs: {} };
      }
      group.attrs[record.column] = record.value;
    }
    await flush();

    syncLogger.debug('Applied change records', { ...result, total: records.length });
    return result;
  }
}
