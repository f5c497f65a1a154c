/**
 * Reconciliation Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Replica } from '../../src/replica/replica.js';
import { InMemoryRelay } from '../../src/sync/in-memory-relay.js';
import { orderForImport, reconcile, STARTING_BALANCE_CATEGORY, STARTING_BALANCE_PAYEE } from '../../src/bank/reconcile.js';
import type { ExternalTransaction } from '../../src/bank/types.js';
import type { EntityRow } from '../../src/types/index.js';
import { FakeWallClock, safeRemoveDir, testDir } from '../helpers/test-dirs.js';

const TODAY = 20240115;

function ext(overrides: Partial<ExternalTransaction> & Pick<ExternalTransaction, 'importedId'>): ExternalTransaction {
  return {
    date: '2024-01-10',
    payeeName: 'Grocer',
    amount: -1200,
    booked: true,
    notes: null,
    ...overrides,
  };
}

describe('reconcile', () => {
  let replica: Replica;
  let dir: string;
  let account: EntityRow;

  async function run(
    transactions: ExternalTransaction[],
    isFirstSync: boolean,
    options: { balance?: number; balanceKind?: 'current' | 'starting'; target?: EntityRow } = {}
  ) {
    const session = replica.edit();
    const results = await reconcile(session, transactions, options.target ?? account, isFirstSync, {
      balance: options.balance,
      balanceKind: options.balanceKind ?? 'current',
      fuzzyMatchWindowDays: 7,
      today: TODAY,
    });
    await replica.commit(session);
    return results;
  }

  async function transactions(): Promise<EntityRow[]> {
    return replica.list('transactions', (t) => t.acct === account.id);
  }

  async function payeeId(name: string): Promise<string> {
    const [payee] = await replica.list('payees', (p) => p.name === name);
    return payee.id;
  }

  async function manual(id: string, payee: string, amount: number, date: number): Promise<void> {
    const session = replica.edit();
    const existing = await session.list('payees', (p) => p.name === payee);
    const payeeRow = existing.length > 0 ? existing[0].id : session.insert('payees', { name: payee });
    session.set('transactions', id, { acct: account.id, amount, date, description: payeeRow });
    await replica.commit(session);
  }

  beforeEach(async () => {
    const relay = new InMemoryRelay();
    dir = testDir('reconcile');
    replica = await Replica.open({
      location: dir,
      transport: relay,
      keyRegistry: relay,
      wallClock: new FakeWallClock(Date.UTC(2024, 0, 15)).now,
    });

    const session = replica.edit();
    session.set('accounts', 'acct-1', {
      name: 'Checking',
      offbudget: false,
      account_id: 'ext-1',
      account_sync_source: 'simpleFin',
    });
    await replica.commit(session);
    const stored = await replica.get('accounts', 'acct-1');
    if (!stored) throw new Error('account fixture missing');
    account = stored;
  });

  afterEach(async () => {
    await replica.close();
    await safeRemoveDir(dir);
  });

  describe('first sync', () => {
    it('should add a starting balance and the imported transaction', async () => {
      const results = await run([ext({ importedId: 'imp-1' })], true, { balance: 5000 });

      expect(results.map((r) => [r.outcome, r.transaction.amount])).toEqual([
        ['created', 6200],
        ['created', -1200],
      ]);

      const rows = await transactions();
      expect(rows).toHaveLength(2);

      const starting = rows.find((t) => t.starting_balance_flag === true);
      expect(starting).toMatchObject({ amount: 6200, date: 20240110, cleared: true });
      expect(starting?.description).toBe(await payeeId(STARTING_BALANCE_PAYEE));

      const [category] = await replica.list('categories', (c) => c.name === STARTING_BALANCE_CATEGORY);
      expect(category.is_income).toBe(true);
      expect(starting?.category).toBe(category.id);

      const imported = rows.find((t) => t.financial_id === 'imp-1');
      expect(imported).toMatchObject({
        amount: -1200,
        date: 20240110,
        imported_description: 'Grocer',
        cleared: true,
        description: await payeeId('Grocer'),
      });
    });

    it('should import nothing new when run again with the same feed', async () => {
      await run([ext({ importedId: 'imp-1' })], true, { balance: 5000 });
      const again = await run([ext({ importedId: 'imp-1' })], true, { balance: 5000 });

      expect(again.map((r) => [r.outcome, r.changed])).toEqual([['unchanged', false]]);
      expect(await transactions()).toHaveLength(2);
    });

    it('should take a starting balance as reported', async () => {
      const results = await run([ext({ importedId: 'imp-1' })], true, { balance: 5000, balanceKind: 'starting' });
      expect(results[0].transaction.amount).toBe(5000);
    });

    it('should skip the starting balance when it is zero', async () => {
      const results = await run([ext({ importedId: 'imp-1', amount: -300 })], true, { balance: -300 });
      expect(results.map((r) => r.transaction.amount)).toEqual([-300]);
    });

    it('should date the starting balance today when the feed is empty', async () => {
      const [starting] = await run([], true, { balance: 1000 });
      expect(starting.transaction).toMatchObject({ amount: 1000, date: TODAY });
    });

    it('should leave off-budget starting balances uncategorized', async () => {
      const session = replica.edit();
      session.set('accounts', 'acct-2', { name: 'Mortgage', offbudget: true });
      await replica.commit(session);
      const offBudget = await replica.get('accounts', 'acct-2');
      if (!offBudget) throw new Error('account fixture missing');

      const [starting] = await run([], true, { balance: -150000, target: offBudget });

      expect(starting.transaction.category).toBeNull();
      expect(await replica.list('categories')).toEqual([]);
    });

    it('should date the starting balance at the oldest transaction whatever the feed order', async () => {
      const results = await run(
        [
          ext({ importedId: 'imp-3', date: '2024-01-12' }),
          ext({ importedId: 'imp-1', date: '2024-01-03' }),
          ext({ importedId: 'imp-2', date: '2024-01-08' }),
        ],
        true,
        { balance: 0 }
      );

      expect(results.map((r) => r.transaction.date)).toEqual([20240103, 20240103, 20240108, 20240112]);
      expect(results[0].transaction.starting_balance_flag).toBe(true);
    });
  });

  it('should never import unbooked transactions', async () => {
    const feed = [ext({ importedId: 'imp-1' }), ext({ importedId: 'pending-1', booked: false, amount: -99 })];

    await run(feed, false);
    await run(feed, false);

    const rows = await transactions();
    expect(rows.map((t) => t.financial_id)).toEqual(['imp-1']);
  });

  it('should not create two transactions for a repeated import id in one feed', async () => {
    const results = await run([ext({ importedId: 'imp-1' }), ext({ importedId: 'imp-1' })], false);

    expect(results.map((r) => r.outcome)).toEqual(['created', 'unchanged']);
    expect(await transactions()).toHaveLength(1);
  });

  describe('fuzzy matching', () => {
    it('should match a manual transaction with the same amount and payee', async () => {
      await manual('manual-1', 'Cafe', -450, 20240105);

      const results = await run([ext({ importedId: 'imp-9', payeeName: 'CAFE', amount: -450, date: '2024-01-07' })], false);

      expect(results.map((r) => [r.outcome, r.transaction.id])).toEqual([['matched', 'manual-1']]);
      expect(await replica.get('transactions', 'manual-1')).toMatchObject({
        financial_id: 'imp-9',
        imported_description: 'CAFE',
        cleared: true,
        date: 20240105,
      });
      expect(await transactions()).toHaveLength(1);
    });

    it('should prefer the closest date', async () => {
      await manual('far', 'Cafe', -450, 20240102);
      await manual('near', 'Cafe', -450, 20240106);

      const [result] = await run([ext({ importedId: 'imp-9', payeeName: 'Cafe', amount: -450, date: '2024-01-07' })], false);

      expect(result.outcome).toBe('matched');
      expect(result.transaction.id).toBe('near');
    });

    it('should create a new transaction when two candidates tie', async () => {
      await manual('before', 'Cafe', -450, 20240105);
      await manual('after', 'Cafe', -450, 20240109);

      const [result] = await run([ext({ importedId: 'imp-9', payeeName: 'Cafe', amount: -450, date: '2024-01-07' })], false);

      expect(result.outcome).toBe('created');
      expect(await transactions()).toHaveLength(3);
    });

    it('should create a new transaction when the payee differs', async () => {
      await manual('manual-1', 'Cafe', -450, 20240105);

      const [result] = await run([ext({ importedId: 'imp-9', payeeName: 'Bakery', amount: -450, date: '2024-01-05' })], false);

      expect(result.outcome).toBe('created');
      expect((await replica.get('transactions', 'manual-1'))?.financial_id).toBeUndefined();
    });

    it('should create a new transaction outside the date window', async () => {
      await manual('manual-1', 'Cafe', -450, 20231220);

      const [result] = await run([ext({ importedId: 'imp-9', payeeName: 'Cafe', amount: -450, date: '2024-01-07' })], false);

      expect(result.outcome).toBe('created');
    });

    it('should match each manual transaction at most once', async () => {
      await manual('manual-1', 'Cafe', -450, 20240105);

      const results = await run(
        [
          ext({ importedId: 'imp-9', payeeName: 'Cafe', amount: -450, date: '2024-01-05' }),
          ext({ importedId: 'imp-10', payeeName: 'Cafe', amount: -450, date: '2024-01-06' }),
        ],
        false
      );

      expect(results.map((r) => r.outcome)).toEqual(['matched', 'created']);
    });
  });
});

describe('orderForImport', () => {
  it('should keep booked transactions oldest first and drop invalid dates', () => {
    const ordered = orderForImport([
      ext({ importedId: 'c', date: '2024-01-09' }),
      ext({ importedId: 'b', date: '2024-01-09' }),
      ext({ importedId: 'x', date: '2024-13-01' }),
      ext({ importedId: 'p', date: '2024-01-01', booked: false }),
      ext({ importedId: 'a', date: '2024-01-02' }),
    ]);

    expect(ordered.map((c) => c.external.importedId)).toEqual(['a', 'b', 'c']);
    expect(ordered.map((c) => c.date)).toEqual([20240102, 20240109, 20240109]);
  });
});
