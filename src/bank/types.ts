/**
 * Bank feed collaborator types
 * @module bank/types
 */

import type { Cents, DateInt, EntityRow } from '../types/index.js';

/**
 * One transaction as delivered by a bank-feed provider
 */
export interface ExternalTransaction {
  /** `YYYY-MM-DD` */
  date: string;
  payeeName: string;
  /** Signed, in cents */
  amount: Cents;
  /** Provider's stable identifier for the transaction */
  importedId: string;
  /** Settled; unsettled transactions are not imported */
  booked: boolean;
  notes?: string | null;
}

/**
 * - `starting`: the balance before the returned transactions
 * - `current`: today's balance, after every returned transaction
 */
export type BalanceKind = 'starting' | 'current';

export interface BankFeed {
  transactions: ExternalTransaction[];
  balance: Cents;
  balanceKind: BalanceKind;
}

export interface FeedRequest {
  account: EntityRow;
  /** `YYYY-MM-DD` */
  startDate: string;
}

/**
 * Bank aggregation integration. Failures should be thrown as BankSyncError.
 */
export interface BankFeedProvider {
  fetchTransactions(request: FeedRequest): Promise<BankFeed>;
}

export interface ReconcileOptions {
  /** Balance reported with the feed; needed for first-sync balancing */
  balance?: Cents;
  balanceKind?: BalanceKind;
  /** Date distance allowed for a fuzzy match (default: 7) */
  fuzzyMatchWindowDays?: number;
  /** Date used when the feed has no transactions */
  today: DateInt;
}
