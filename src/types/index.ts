/**
 * Ledger Replica Type Definitions
 * @module types
 */

// ============================================================================
// Core Types
// ============================================================================

/** 16 upper-case hex characters identifying one replica */
export type ClientId = string;

/** Replicated value of a single field */
export type Variant = null | boolean | number | string;

/** Column name -> value map for one entity row */
export type Attributes = Record<string, Variant>;

/** Calendar date stored as a YYYYMMDD integer */
export type DateInt = number;

/** Wall-clock source in epoch milliseconds; injected so tests stay deterministic */
export type WallClock = () => number;

/** Amount in minor currency units (cents) */
export type Cents = number;

// ============================================================================
// Entity Rows
// ============================================================================

export interface EntityRow {
  id: string;
  [column: string]: Variant;
}

/** Outcome of reconciling one external transaction */
export type ReconcileOutcome = 'created' | 'matched' | 'unchanged';

export interface ReconciledTransaction {
  transaction: EntityRow;
  outcome: ReconcileOutcome;
  /** True for created and matched rows */
  changed: boolean;
}

// ============================================================================
// Date helpers
// ============================================================================

export function toDateInt(date: Date): DateInt {
  return date.getUTCFullYear() * 10000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate();
}

export function fromDateInt(value: DateInt): Date {
  const year = Math.floor(value / 10000);
  const month = Math.floor((value % 10000) / 100);
  const day = value % 100;
  return new Date(Date.UTC(year, month - 1, day));
}

/** Parse `YYYY-MM-DD` into a DateInt, or null when malformed */
export function parseDateInt(value: string): DateInt | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  if (Number.isNaN(date.getTime()) || toDateInt(date) !== Number(match[1] + match[2] + match[3])) {
    return null;
  }
  return toDateInt(date);
}

export function addDays(value: DateInt, days: number): DateInt {
  const date = fromDateInt(value);
  date.setUTCDate(date.getUTCDate() + days);
  return toDateInt(date);
}

/** Whole days from `a` to `b` */
export function daysBetween(a: DateInt, b: DateInt): number {
  return Math.round((fromDateInt(b).getTime() - fromDateInt(a).getTime()) / 86_400_000);
}

/** Format a DateInt as `YYYY-MM-DD` */
export function formatDateInt(value: DateInt): string {
  return fromDateInt(value).toISOString().slice(0, 10);
}
