/**
 * Bank Sync - pulls linked accounts' feeds and reconciles them
 * @module bank/bank-sync
 */

import type { DateInt, EntityRow, ReconciledTransaction, WallClock } from '../types/index.js';
import { addDays, formatDateInt, toDateInt } from '../types/index.js';
import { DEFAULT_CONFIG, type ReplicaConfig } from '../config/index.js';
import { BankSyncError, NotFoundError, isReplicaError } from '../errors/index.js';
import { createEvent } from '../events/event-bus.js';
import type { Replica } from '../replica/replica.js';
import { isLive } from '../storage/ledger-store.js';
import { bankLogger } from '../utils/logger.js';
import { reconcile } from './reconcile.js';
import type { BankFeed, BankFeedProvider } from './types.js';

export interface BankSyncOptions {
  config?: Partial<Pick<ReplicaConfig, 'bankSyncLookbackDays' | 'fuzzyMatchWindowDays'>>;
  wallClock?: WallClock;
}

export interface BankSyncRun {
  /** Sync only this account; every linked account otherwise */
  accountId?: string;
  /** Fetch from this date instead of the newest imported one */
  startDate?: DateInt;
}

/** Linked to a bank feed, open and not deleted */
export function isLinkedAccount(account: EntityRow): boolean {
  return (
    isLive(account) &&
    account.closed !== true &&
    typeof account.account_id === 'string' &&
    account.account_id !== '' &&
    typeof account.account_sync_source === 'string' &&
    account.account_sync_source !== ''
  );
}

export class BankSync {
  private lookbackDays: number;
  private matchWindowDays: number;
  private wallClock: WallClock;

  constructor(
    private readonly replica: Replica,
    private readonly provider: BankFeedProvider,
    options: BankSyncOptions = {}
  ) {
    this.lookbackDays = options.config?.bankSyncLookbackDays ?? DEFAULT_CONFIG.bankSyncLookbackDays;
    this.matchWindowDays = options.config?.fuzzyMatchWindowDays ?? DEFAULT_CONFIG.fuzzyMatchWindowDays;
    this.wallClock = options.wallClock ?? Date.now;
  }

  /**
   * @returns Transactions created or matched, across every synced account
   * @throws {NotFoundError} for an unknown or deleted `accountId`
   * @throws {BankSyncError} when the provider fails
   */
  async run(options: BankSyncRun = {}): Promise<ReconciledTransaction[]> {
    const accounts = await this.selectAccounts(options.accountId);
    const changed: ReconciledTransaction[] = [];
    for (const account of accounts) {
      changed.push(...(await this.syncAccount(account, options.startDate)));
    }
    return changed;
  }

  private async selectAccounts(accountId: string | undefined): Promise<EntityRow[]> {
    if (accountId === undefined) {
      return this.replica.list('accounts', isLinkedAccount);
    }
    const account = await this.replica.get('accounts', accountId);
    if (!account || !isLive(account)) {
      throw new NotFoundError('account', accountId);
    }
    if (!isLinkedAccount(account)) {
      bankLogger.warn('Account is not linked to a bank feed', { account: accountId });
      return [];
    }
    return [account];
  }

  private async syncAccount(account: EntityRow, startDate: DateInt | undefined): Promise<ReconciledTransaction[]> {
    const today = toDateInt(new Date(this.wallClock()));
    const session = this.replica.edit();

    try {
      const transactions = await session.list('transactions', (t) => isLive(t) && t.acct === account.id);
      const isFirstSync = transactions.length === 0;
      const dates = transactions.flatMap((t) => (typeof t.date === 'number' ? [t.date] : []));
      const start =
        startDate ?? (dates.length > 0 ? Math.max(...dates) : addDays(today, -this.lookbackDays));

      const feed = await this.fetch(account, start);
      const results = await reconcile(session, feed.transactions, account, isFirstSync, {
        balance: feed.balance,
        balanceKind: feed.balanceKind,
        fuzzyMatchWindowDays: this.matchWindowDays,
        today,
      });
      await this.replica.commit(session);

      const changed = results.filter((r) => r.changed);
      const summary = {
        accountId: account.id,
        created: changed.filter((r) => r.outcome === 'created').length,
        matched: changed.filter((r) => r.outcome === 'matched').length,
        skipped: feed.transactions.filter((t) => !t.booked).length,
      };
      bankLogger.info('Bank sync completed', { ...summary, firstSync: isFirstSync });
      this.replica.events.publish(createEvent('bank:imported', 'bank-sync', summary));
      return changed;
    } finally {
      if (session.getStatus() === 'open') session.abort();
    }
  }

  private async fetch(account: EntityRow, startDate: DateInt): Promise<BankFeed> {
    bankLogger.debug('Fetching bank feed', { account: account.id, startDate: formatDateInt(startDate) });
    try {
      return await this.provider.fetchTransactions({ account, startDate: formatDateInt(startDate) });
    } catch (err) {
      if (isReplicaError(err)) throw err;
      throw new BankSyncError('PROVIDER_ERROR', 'failed', err instanceof Error ? err.message : String(err));
    }
  }
}
