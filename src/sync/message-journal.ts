/**
 * Message Journal - every applied ChangeRecord, keyed by its timestamp
 *
 * Tracks, per cell, the timestamp of the record that currently owns the
 * visible value. Together these make application idempotent and
 * order-insensitive:
 * - a record already journaled is a duplicate and changes nothing;
 * - a record older than the cell's current writer is journaled as stale and
 *   does not touch the row.
 *
 * Locally produced records are also indexed under `out:<timestamp>` until the
 * relay acknowledges them, so the outbox is read without scanning the journal.
 *
 * @module sync/message-journal
 */

import type { Variant } from '../types/index.js';
import type { KeyValueStore } from '../storage/database.js';
import { Timestamp } from '../clock/hlc.js';
import { createChangeRecord, isVariant, type ChangeRecord } from './change-record.js';
import { contentHash, type SHA3Hash } from '../utils/hash.js';
import { syncLogger } from '../utils/logger.js';

export interface JournalEntry {
  timestamp: string;
  dataset: string;
  row: string;
  column: string;
  value: Variant;
  hash: SHA3Hash;
}

/**
 * - `applied`: the record now owns its cell
 * - `stale`: a newer record already owns the cell
 * - `duplicate`: this timestamp was journaled before
 */
export type RecordOutcome = 'applied' | 'stale' | 'duplicate';

export interface JournalStats {
  totalEntries: number;
  pending: number;
  byDataset: Record<string, number>;
}

function parseEntry(raw: string): JournalEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'timestamp' in parsed &&
    typeof parsed.timestamp === 'string' &&
    'dataset' in parsed &&
    typeof parsed.dataset === 'string' &&
    'row' in parsed &&
    typeof parsed.row === 'string' &&
    'column' in parsed &&
    typeof parsed.column === 'string' &&
    'value' in parsed &&
    isVariant(parsed.value) &&
    'hash' in parsed &&
    typeof parsed.hash === 'string'
  ) {
    return {
      timestamp: parsed.timestamp,
      dataset: parsed.dataset,
      row: parsed.row,
      column: parsed.column,
      value: parsed.value,
      hash: parsed.hash,
    };
  }
  return null;
}

export class MessageJournal {
  private static readonly MSG_PREFIX = 'msg:';
  private static readonly CELL_PREFIX = 'cell:';
  private static readonly OUT_PREFIX = 'out:';

  constructor(private readonly kv: KeyValueStore) {}

  async get(timestamp: string): Promise<JournalEntry | null> {
    const raw = await this.kv.get(MessageJournal.MSG_PREFIX + timestamp);
    if (raw === null) return null;
    const entry = parseEntry(raw);
    if (!entry) {
      throw new Error(`Corrupted journal entry at ${timestamp}`);
    }
    return entry;
  }

  /**
   * Timestamp of the record owning a cell, or null if never written
   */
  async cellWriter(dataset: string, row: string, column: string): Promise<string | null> {
    return this.kv.get(this.cellKey(dataset, row, column));
  }

  /**
   * Journal `record` and report whether it should reach the row
   */
  async record(record: ChangeRecord, options: { outbox?: boolean } = {}): Promise<RecordOutcome> {
    const timestamp = record.timestamp.toString();
    const hash = contentHash(record.dataset, record.row, record.column, record.value);

    const existing = await this.get(timestamp);
    if (existing) {
      if (existing.hash !== hash) {
        syncLogger.warn('Ignoring a different record reusing a journaled timestamp', { timestamp });
      }
      return 'duplicate';
    }

    const entry: JournalEntry = {
      timestamp,
      dataset: record.dataset,
      row: record.row,
      column: record.column,
      value: record.value,
      hash,
    };
    await this.kv.put(MessageJournal.MSG_PREFIX + timestamp, JSON.stringify(entry));
    if (options.outbox) {
      await this.kv.put(MessageJournal.OUT_PREFIX + timestamp, '');
    }

    const cellKey = this.cellKey(record.dataset, record.row, record.column);
    const owner = await this.kv.get(cellKey);
    if (owner !== null && owner > timestamp) {
      return 'stale';
    }
    await this.kv.put(cellKey, timestamp);
    return 'applied';
  }

  /**
   * Outbox records in timestamp order
   */
  async pending(): Promise<ChangeRecord[]> {
    const records: ChangeRecord[] = [];
    for (const timestamp of await this.outboxTimestamps()) {
      const entry = await this.get(timestamp);
      if (!entry) {
        syncLogger.error('Outbox points at a missing journal entry', { timestamp });
        continue;
      }
      const record = this.toRecord(entry);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Every journaled record in timestamp order, applied or stale
   */
  async history(): Promise<ChangeRecord[]> {
    const records: ChangeRecord[] = [];
    for (const entry of await this.scan()) {
      const record = this.toRecord(entry);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Drop acknowledged records from the outbox
   * @returns How many entries left the outbox
   */
  async markSent(timestamps: Iterable<string>): Promise<number> {
    let changed = 0;
    for (const timestamp of timestamps) {
      const key = MessageJournal.OUT_PREFIX + timestamp;
      if ((await this.kv.get(key)) === null) continue;
      await this.kv.del(key);
      changed++;
    }
    return changed;
  }

  async getStats(): Promise<JournalStats> {
    const stats: JournalStats = { totalEntries: 0, pending: 0, byDataset: {} };
    for (const entry of await this.scan()) {
      stats.totalEntries++;
      stats.byDataset[entry.dataset] = (stats.byDataset[entry.dataset] ?? 0) + 1;
    }
    stats.pending = (await this.outboxTimestamps()).length;
    return stats;
  }

  private async outboxTimestamps(): Promise<string[]> {
    const entries = await this.kv.entries(MessageJournal.OUT_PREFIX);
    return entries.map(([key]) => key.slice(MessageJournal.OUT_PREFIX.length));
  }

  private toRecord(entry: JournalEntry): ChangeRecord | null {
    const timestamp = Timestamp.parse(entry.timestamp);
    if (!timestamp) {
      syncLogger.error('Skipping journal entry with a malformed timestamp', { timestamp: entry.timestamp });
      return null;
    }
    return createChangeRecord(entry, timestamp);
  }

  private async scan(): Promise<JournalEntry[]> {
    const entries: JournalEntry[] = [];
    for (const [key, raw] of await this.kv.entries(MessageJournal.MSG_PREFIX)) {
      const entry = parseEntry(raw);
      if (entry) {
        entries.push(entry);
      } else {
        syncLogger.error('Skipping corrupted journal entry', { key });
      }
    }
    return entries;
  }

  private cellKey(dataset: string, row: string, column: string): string {
    return MessageJournal.CELL_PREFIX + JSON.stringify([dataset, row, column]);
  }
}
