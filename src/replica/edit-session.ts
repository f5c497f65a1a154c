/**
 * Edit Session - buffered local edits committed in one transaction
 *
 * Reads see the stored rows overlaid with the session's pending values. Nothing
 * is stamped or written until `commit()`.
 *
 * @module replica/edit-session
 */

import type { Attributes, EntityRow, Variant } from '../types/index.js';
import { EditSessionError, InvalidValueError } from '../errors/index.js';
import type { KeyValueStore } from '../storage/database.js';
import { LedgerStore } from '../storage/ledger-store.js';
import type { SchemaRegistry } from '../storage/schema.js';
import { ChangeBuffer } from '../sync/change-buffer.js';
import { PREFS_DATASET, type ChangeRecord } from '../sync/change-record.js';
import { generateUUID } from '../utils/uuid.js';

/** Column that carries a preference value in the `prefs` dataset */
const PREF_COLUMN = 'value';

export type EditSessionStatus = 'open' | 'committed' | 'aborted';

export type Committer = (buffer: ChangeBuffer) => Promise<ChangeRecord[]>;

export class EditSession {
  private buffer = new ChangeBuffer();
  private status: EditSessionStatus = 'open';
  private ledger: LedgerStore;

  constructor(
    store: KeyValueStore,
    private readonly schema: SchemaRegistry,
    private readonly committer: Committer
  ) {
    this.ledger = new LedgerStore(store, schema);
  }

  getStatus(): EditSessionStatus {
    return this.status;
  }

  /** Pending cell writes */
  get size(): number {
    return this.buffer.size;
  }

  /**
   * Buffer `fields` for one row
   *
   * @throws {UnsupportedSchemaError} for an undeclared dataset or column
   * @throws {InvalidValueError} when a value does not fit its column
   */
  set(dataset: string, row: string, fields: Attributes): void {
    this.ensureOpen();
    for (const [name, value] of Object.entries(fields)) {
      const column = this.schema.requireColumn(dataset, name);
      if (name === 'id') {
        if (value !== row) throw new InvalidValueError(dataset, name, `'${row}'`, value);
        continue;
      }
      if (!this.schema.accepts(column, value)) {
        throw new InvalidValueError(dataset, name, column.type, value);
      }
    }
    for (const [name, value] of Object.entries(fields)) {
      if (name === 'id') continue;
      this.buffer.record(dataset, row, name, value);
    }
  }

  /**
   * Buffer a new row under a fresh id
   * @returns The new id
   */
  insert(dataset: string, fields: Attributes): string {
    const id = generateUUID();
    this.set(dataset, id, fields);
    return id;
  }

  /** Soft delete */
  delete(dataset: string, row: string): void {
    this.set(dataset, row, { tombstone: true });
  }

  setPref(key: string, value: Variant): void {
    this.ensureOpen();
    this.buffer.record(PREFS_DATASET, key, PREF_COLUMN, value);
  }

  async get(dataset: string, row: string): Promise<EntityRow | null> {
    this.ensureOpen();
    const stored = await this.ledger.get(dataset, row);
    const pending = this.buffer.peek(dataset, row);
    if (!pending) return stored;
    return { ...(stored ?? {}), ...pending, id: row };
  }

  async list(dataset: string, predicate?: (row: EntityRow) => boolean): Promise<EntityRow[]> {
    this.ensureOpen();
    const rows = new Map<string, EntityRow>();
    for (const row of await this.ledger.list(dataset)) {
      rows.set(row.id, row);
    }
    for (const id of this.buffer.rows(dataset)) {
      rows.set(id, { ...(rows.get(id) ?? {}), ...(this.buffer.peek(dataset, id) ?? {}), id });
    }
    const result = Array.from(rows.values());
    return predicate ? result.filter(predicate) : result;
  }

  /**
   * Stamp and durably apply the buffered edits
   * @returns The committed records in timestamp order
   */
  async commit(): Promise<ChangeRecord[]> {
    this.ensureOpen();
    const records = await this.committer(this.buffer);
    this.status = 'committed';
    return records;
  }

  abort(): void {
    this.ensureOpen();
    this.buffer.clear();
    this.status = 'aborted';
  }

  private ensureOpen(): void {
    if (this.status !== 'open') {
      throw new EditSessionError(`Edit session is already ${this.status}`);
    }
  }
}
