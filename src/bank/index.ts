/**
 * Bank feed import
 * @module bank
 */

export {
  reconcile,
  orderForImport,
  STARTING_BALANCE_PAYEE,
  STARTING_BALANCE_CATEGORY,
  DEFAULT_MATCH_WINDOW_DAYS,
} from './reconcile.js';
export { BankSync, isLinkedAccount, type BankSyncOptions, type BankSyncRun } from './bank-sync.js';
export type {
  ExternalTransaction,
  BalanceKind,
  BankFeed,
  BankFeedProvider,
  FeedRequest,
  ReconcileOptions,
} from './types.js';
