/**
 * Change Buffer - pending edits of one editing session
 *
 * Keyed by (dataset, row, column): writing a cell again replaces its pending
 * value and moves it to the end, so flush order is the order of each cell's
 * last write. Timestamps are assigned only at flush time, one per entry and
 * strictly increasing.
 *
 * @module sync/change-buffer
 */

import type { Attributes, Variant } from '../types/index.js';
import type { HybridLogicalClock } from '../clock/hlc.js';
import { cellKey, createChangeRecord, type ChangeInput, type ChangeRecord } from './change-record.js';

export type PendingEdit = ChangeInput;

export class ChangeBuffer {
  private pending = new Map<string, PendingEdit>();

  record(dataset: string, row: string, column: string, value: Variant): void {
    const edit: PendingEdit = { dataset, row, column, value };
    const key = cellKey(edit);
    this.pending.delete(key);
    this.pending.set(key, edit);
  }

  get size(): number {
    return this.pending.size;
  }

  isEmpty(): boolean {
    return this.pending.size === 0;
  }

  /**
   * Pending values for one row, or null if the row has none
   */
  peek(dataset: string, row: string): Attributes | null {
    let attrs: Attributes | null = null;
    for (const edit of this.pending.values()) {
      if (edit.dataset !== dataset || edit.row !== row) continue;
      attrs = attrs ?? {};
      attrs[edit.column] = edit.value;
    }
    return attrs;
  }

  /** Rows of `dataset` with pending edits */
  rows(dataset: string): string[] {
    const rows = new Set<string>();
    for (const edit of this.pending.values()) {
      if (edit.dataset === dataset) rows.add(edit.row);
    }
    return Array.from(rows);
  }

  entries(): PendingEdit[] {
    return Array.from(this.pending.values());
  }

  /**
   * Stamp every pending edit and empty the buffer. The buffer is left intact
   * if the clock throws.
   */
  flush(clock: HybridLogicalClock): ChangeRecord[] {
    const records = Array.from(this.pending.values(), (edit) => createChangeRecord(edit, clock.now()));
    this.pending.clear();
    return records;
  }

  clear(): void {
    this.pending.clear();
  }
}
