/**
 * Change Record - one field assignment on one entity, the unit of replication
 *
 * @module sync/change-record
 */

import type { Variant } from '../types/index.js';
import type { Timestamp } from '../clock/hlc.js';

/**
 * Last-writer-wins assignment of `column` on entity `row` of `dataset`.
 * Immutable once constructed.
 */
export interface ChangeRecord {
  readonly dataset: string;
  readonly row: string;
  readonly column: string;
  readonly value: Variant;
  readonly timestamp: Timestamp;
}

/** Field assignment not yet stamped */
export type ChangeInput = Omit<ChangeRecord, 'timestamp'>;

/** Dataset whose records patch the metadata document instead of entity rows */
export const PREFS_DATASET = 'prefs';

export function createChangeRecord(input: ChangeInput, timestamp: Timestamp): ChangeRecord {
  return Object.freeze({
    dataset: input.dataset,
    row: input.row,
    column: input.column,
    value: input.value,
    timestamp,
  });
}

export function isVariant(value: unknown): value is Variant {
  return (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'string' ||
    typeof value === 'number'
  );
}

/** Key of the cell a record writes */
export function cellKey(record: Pick<ChangeRecord, 'dataset' | 'row' | 'column'>): string {
  return `${record.dataset}:${record.row}:${record.column}`;
}

export function compareRecords(a: ChangeRecord, b: ChangeRecord): number {
  return a.timestamp.compare(b.timestamp);
}
