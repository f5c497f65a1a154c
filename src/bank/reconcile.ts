/**
 * Reconciliation Engine - imports an external transaction feed into the ledger
 *
 * Transactions are processed oldest to newest. Each one is matched by import
 * id first, then by a conservative fuzzy match (same amount, payee name and a
 * nearby date); anything ambiguous becomes a new transaction rather than
 * being merged into an unrelated one.
 *
 * @module bank/reconcile
 */

import type { Attributes, DateInt, EntityRow, ReconciledTransaction } from '../types/index.js';
import { daysBetween, parseDateInt } from '../types/index.js';
import type { EditSession } from '../replica/edit-session.js';
import { isLive } from '../storage/ledger-store.js';
import { bankLogger } from '../utils/logger.js';
import type { ExternalTransaction, ReconcileOptions } from './types.js';

export const STARTING_BALANCE_PAYEE = 'Starting Balance';
export const STARTING_BALANCE_CATEGORY = 'Starting Balances';
export const DEFAULT_MATCH_WINDOW_DAYS = 7;

interface ImportCandidate {
  external: ExternalTransaction;
  date: DateInt;
}

function text(row: EntityRow, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' && value !== '' ? value : null;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Booked transactions with valid dates, oldest first. Feeds usually arrive
 * newest first, so same-day entries keep the reverse of feed order.
 */
export function orderForImport(transactions: readonly ExternalTransaction[]): ImportCandidate[] {
  const candidates: ImportCandidate[] = [];
  for (const external of [...transactions].reverse()) {
    if (!external.booked) continue;
    const date = parseDateInt(external.date);
    if (date === null) {
      bankLogger.warn('Skipping external transaction with an invalid date', {
        importedId: external.importedId,
        date: external.date,
      });
      continue;
    }
    candidates.push({ external, date });
  }
  return candidates.sort((a, b) => a.date - b.date);
}

/**
 * Payee and category lookups cached for one reconciliation run
 */
class LedgerLookups {
  private payees = new Map<string, string>();

  private constructor(private readonly session: EditSession) {}

  static async load(session: EditSession): Promise<LedgerLookups> {
    const lookups = new LedgerLookups(session);
    for (const payee of await session.list('payees', isLive)) {
      const name = text(payee, 'name');
      if (name !== null && !lookups.payees.has(normalizeName(name))) {
        lookups.payees.set(normalizeName(name), payee.id);
      }
    }
    return lookups;
  }

  payeeName(id: string | null): string | null {
    if (id === null) return null;
    for (const [name, payeeId] of this.payees) {
      if (payeeId === id) return name;
    }
    return null;
  }

  getOrCreatePayee(name: string): string {
    const key = normalizeName(name);
    const existing = this.payees.get(key);
    if (existing) return existing;
    const id = this.session.insert('payees', { name: name.trim() });
    this.payees.set(key, id);
    return id;
  }

  /**
   * Income category named "Starting Balances", created under the first income
   * group when missing
   */
  async startingBalanceCategory(): Promise<string> {
    const categories = await this.session.list('categories', isLive);
    const found = categories.find(
      (c) => c.is_income === true && normalizeName(text(c, 'name') ?? '') === normalizeName(STARTING_BALANCE_CATEGORY)
    );
    if (found) return found.id;

    const groups = await this.session.list('category_groups', (g) => isLive(g) && g.is_income === true);
    return this.session.insert('categories', {
      name: STARTING_BALANCE_CATEGORY,
      is_income: true,
      cat_group: groups.length > 0 ? groups[0].id : null,
    });
  }
}

/**
 * Import `externalTransactions` into `account` through `session`.
 *
 * Only booked transactions are imported. On the first sync a starting-balance
 * transaction is added so the account balance matches the bank's.
 *
 * @returns One entry per imported transaction, plus the starting balance
 */
export async function reconcile(
  session: EditSession,
  externalTransactions: readonly ExternalTransaction[],
  account: EntityRow,
  isFirstSync: boolean,
  options: ReconcileOptions
): Promise<ReconciledTransaction[]> {
  const window = options.fuzzyMatchWindowDays ?? DEFAULT_MATCH_WINDOW_DAYS;
  const ordered = orderForImport(externalTransactions);
  const lookups = await LedgerLookups.load(session);
  const existing = await session.list('transactions', (t) => isLive(t) && t.acct === account.id);
  const results: ReconciledTransaction[] = [];

  if (isFirstSync && options.balance !== undefined) {
    const entry = await createStartingBalance(session, lookups, account, existing, ordered, options);
    if (entry) {
      existing.push(entry.transaction);
      results.push(entry);
    }
  }

  const matched = new Set<string>();
  for (const candidate of ordered) {
    const result = reconcileOne(session, lookups, account, existing, matched, candidate, window);
    if (result.outcome === 'created') existing.push(result.transaction);
    if (result.outcome !== 'created') matched.add(result.transaction.id);
    results.push(result);
  }

  bankLogger.info('Reconciled bank feed', {
    account: account.id,
    imported: ordered.length,
    created: results.filter((r) => r.outcome === 'created').length,
    matched: results.filter((r) => r.outcome === 'matched').length,
  });
  return results;
}

async function createStartingBalance(
  session: EditSession,
  lookups: LedgerLookups,
  account: EntityRow,
  existing: EntityRow[],
  ordered: ImportCandidate[],
  options: ReconcileOptions
): Promise<ReconciledTransaction | null> {
  if (existing.some((t) => t.starting_balance_flag === true)) {
    bankLogger.debug('Account already has a starting balance', { account: account.id });
    return null;
  }

  const balance = options.balance ?? 0;
  const amount =
    options.balanceKind === 'current'
      ? balance - ordered.reduce((sum, c) => sum + c.external.amount, 0)
      : balance;
  if (amount === 0) return null;

  const fields: Attributes = {
    acct: account.id,
    amount,
    date: ordered.length > 0 ? ordered[0].date : options.today,
    description: lookups.getOrCreatePayee(STARTING_BALANCE_PAYEE),
    category: account.offbudget === true ? null : await lookups.startingBalanceCategory(),
    cleared: true,
    starting_balance_flag: true,
  };
  const id = session.insert('transactions', fields);
  return { transaction: { ...fields, id }, outcome: 'created', changed: true };
}

function reconcileOne(
  session: EditSession,
  lookups: LedgerLookups,
  account: EntityRow,
  existing: EntityRow[],
  matched: Set<string>,
  candidate: ImportCandidate,
  window: number
): ReconciledTransaction {
  const { external, date } = candidate;

  const imported = existing.find((t) => t.financial_id === external.importedId);
  if (imported) {
    return { transaction: imported, outcome: 'unchanged', changed: false };
  }

  const fuzzy = findFuzzyMatch(lookups, existing, matched, candidate, window);
  if (fuzzy) {
    const update: Attributes = {
      financial_id: external.importedId,
      imported_description: external.payeeName,
      cleared: true,
    };
    session.set('transactions', fuzzy.id, update);
    const transaction = { ...fuzzy, ...update };
    existing.splice(existing.indexOf(fuzzy), 1, transaction);
    return { transaction, outcome: 'matched', changed: true };
  }

  const fields: Attributes = {
    acct: account.id,
    amount: external.amount,
    date,
    description: lookups.getOrCreatePayee(external.payeeName),
    notes: external.notes ?? null,
    financial_id: external.importedId,
    imported_description: external.payeeName,
    cleared: external.booked,
  };
  const id = session.insert('transactions', fields);
  return { transaction: { ...fields, id }, outcome: 'created', changed: true };
}

/**
 * The unique closest-dated transaction with the same amount and payee name
 * and no import id, or null on a tie or no candidate
 */
function findFuzzyMatch(
  lookups: LedgerLookups,
  existing: EntityRow[],
  matched: Set<string>,
  { external, date }: ImportCandidate,
  window: number
): EntityRow | null {
  const payeeName = normalizeName(external.payeeName);
  let best: EntityRow | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  let tied = false;

  for (const row of existing) {
    if (matched.has(row.id) || text(row, 'financial_id') !== null) continue;
    if (row.starting_balance_flag === true || row.amount !== external.amount) continue;
    if (typeof row.date !== 'number') continue;

    const distance = Math.abs(daysBetween(row.date, date));
    if (distance > window) continue;
    if (lookups.payeeName(text(row, 'description')) !== payeeName) continue;

    if (distance < bestDistance) {
      best = row;
      bestDistance = distance;
      tied = false;
    } else if (distance === bestDistance) {
      tied = true;
    }
  }

  if (tied) {
    bankLogger.debug('Ambiguous fuzzy match, creating a new transaction', { importedId: external.importedId });
    return null;
  }
  return best;
}
