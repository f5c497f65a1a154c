/**
 * Ledger Store - entity rows addressed by (dataset, row)
 * @module storage/ledger-store
 */

import type { Attributes, EntityRow } from '../types/index.js';
import type { KeyValueStore } from './database.js';
import type { SchemaRegistry } from './schema.js';
import { isVariant } from '../sync/change-record.js';
import { storeLogger } from '../utils/logger.js';

const ROW_PREFIX = 'row:';

function rowKey(dataset: string, row: string): string {
  return `${ROW_PREFIX}${dataset}:${row}`;
}

function parseRow(key: string, raw: string): EntityRow | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    storeLogger.error('Corrupted entity row', { key });
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const row: EntityRow = { id: '' };
  for (const [column, value] of Object.entries(parsed)) {
    if (isVariant(value)) row[column] = value;
  }
  return typeof row.id === 'string' && row.id !== '' ? row : null;
}

/**
 * Entity access over any KeyValueStore. Built per transaction so every read
 * sees that transaction's staged writes.
 */
export class LedgerStore {
  constructor(
    private readonly kv: KeyValueStore,
    readonly schema: SchemaRegistry
  ) {}

  async get(dataset: string, row: string): Promise<EntityRow | null> {
    const key = rowKey(dataset, row);
    const raw = await this.kv.get(key);
    return raw === null ? null : parseRow(key, raw);
  }

  async getOrCreate(dataset: string, row: string): Promise<EntityRow> {
    return (await this.get(dataset, row)) ?? { id: row };
  }

  /**
   * Merge `attrs` into the row, creating it when missing
   */
  async update(dataset: string, row: string, attrs: Attributes): Promise<EntityRow> {
    const current = await this.getOrCreate(dataset, row);
    const next: EntityRow = { ...current, ...attrs, id: row };
    await this.kv.put(rowKey(dataset, row), JSON.stringify(next));
    return next;
  }

  async list(dataset: string, predicate?: (row: EntityRow) => boolean): Promise<EntityRow[]> {
    const rows: EntityRow[] = [];
    for (const [key, raw] of await this.kv.entries(`${ROW_PREFIX}${dataset}:`)) {
      const row = parseRow(key, raw);
      if (row && (!predicate || predicate(row))) rows.push(row);
    }
    return rows;
  }

  async count(dataset: string): Promise<number> {
    return (await this.kv.entries(`${ROW_PREFIX}${dataset}:`)).length;
  }
}

/** Rows whose tombstone is not set */
export function isLive(row: EntityRow): boolean {
  return row.tombstone !== true;
}
