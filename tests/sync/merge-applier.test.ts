/**
 * MergeApplier Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReplicaDatabase } from '../../src/storage/database.js';
import { LedgerStore } from '../../src/storage/ledger-store.js';
import { MetadataStore, PREFS_DOCUMENT } from '../../src/storage/metadata-store.js';
import { SchemaRegistry } from '../../src/storage/schema.js';
import { MergeApplier } from '../../src/sync/merge-applier.js';
import { createChangeRecord, type ChangeRecord } from '../../src/sync/change-record.js';
import { Timestamp } from '../../src/clock/hlc.js';
import { UnsupportedSchemaError } from '../../src/errors/index.js';
import type { Variant } from '../../src/types/index.js';
import { safeRemoveDir, testDir } from '../helpers/test-dirs.js';

const CLIENT = '000000000000000A';

function rec(dataset: string, row: string, column: string, value: Variant, millis: number): ChangeRecord {
  return createChangeRecord({ dataset, row, column, value }, new Timestamp(millis, 0, CLIENT));
}

describe('MergeApplier', () => {
  let db: ReplicaDatabase;
  let schema: SchemaRegistry;
  let applier: MergeApplier;
  let ledger: LedgerStore;
  let dir: string;

  beforeEach(async () => {
    dir = testDir('merge');
    db = new ReplicaDatabase({ location: dir });
    await db.open();
    schema = new SchemaRegistry();
    applier = new MergeApplier(db, schema);
    ledger = new LedgerStore(db, schema);
  });

  afterEach(async () => {
    await db.close();
    await safeRemoveDir(dir);
  });

  it('should let the later record win in a single batch', async () => {
    const result = await applier.apply([
      rec('transactions', 'A', 'amount', 100, 1000),
      rec('transactions', 'A', 'amount', 200, 2000),
    ]);

    expect(await ledger.get('transactions', 'A')).toEqual({ id: 'A', amount: 200 });
    expect(result.rowWrites).toBe(1);
    expect(result.applied).toBe(2);
  });

  it('should reach the same value when the records arrive in separate batches', async () => {
    await applier.apply([rec('transactions', 'A', 'amount', 100, 1000)]);
    await applier.apply([rec('transactions', 'A', 'amount', 200, 2000)]);

    expect((await ledger.get('transactions', 'A'))?.amount).toBe(200);
  });

  it('should ignore an older record delivered after a newer one', async () => {
    await applier.apply([rec('transactions', 'A', 'amount', 200, 2000)]);
    const result = await applier.apply([rec('transactions', 'A', 'amount', 100, 1000)]);

    expect((await ledger.get('transactions', 'A'))?.amount).toBe(200);
    expect(result.stale).toBe(1);
  });

  it('should leave the store unchanged when a batch is applied twice', async () => {
    const batch = [
      rec('accounts', 'acct-1', 'name', 'Checking', 1000),
      rec('transactions', 'A', 'amount', 100, 1001),
      rec('transactions', 'A', 'acct', 'acct-1', 1002),
    ];
    await applier.apply(batch);
    const once = await ledger.list('transactions');

    const second = await applier.apply(batch);

    expect(await ledger.list('transactions')).toEqual(once);
    expect(second).toEqual({ applied: 0, stale: 0, duplicates: 3, prefs: 0, rowWrites: 0 });
  });

  it('should group only consecutive records of the same row', async () => {
    const result = await applier.apply([
      rec('transactions', 'A', 'amount', 1, 1000),
      rec('transactions', 'A', 'notes', 'x', 1001),
      rec('transactions', 'B', 'amount', 2, 1002),
      rec('transactions', 'A', 'amount', 3, 1003),
    ]);

    expect(result.rowWrites).toBe(3);
    expect(await ledger.get('transactions', 'A')).toEqual({ id: 'A', amount: 3, notes: 'x' });
    expect(await ledger.get('transactions', 'B')).toEqual({ id: 'B', amount: 2 });
  });

  it('should route prefs records to the prefs document', async () => {
    const result = await applier.apply([
      rec('transactions', 'A', 'amount', 5, 1000),
      rec('prefs', 'budgetName', 'value', 'Household', 1001),
      rec('transactions', 'A', 'notes', 'same row', 1002),
    ]);

    expect(await new MetadataStore(db, PREFS_DOCUMENT).get('budgetName')).toBe('Household');
    expect(await ledger.get('prefs', 'budgetName')).toBeNull();
    expect(await ledger.get('transactions', 'A')).toEqual({ id: 'A', amount: 5, notes: 'same row' });
    expect(result.prefs).toBe(1);
    expect(result.rowWrites).toBe(1);
  });

  it('should leave replica settings alone when a pref shares their name', async () => {
    const settings = new MetadataStore(db);
    await settings.patch({ groupId: 'group-1', encryptKeyId: 'key-1' });

    await applier.apply([
      rec('prefs', 'groupId', 'value', 'group-2', 1000),
      rec('prefs', 'encryptKeyId', 'value', null, 1001),
    ]);

    expect(await settings.read()).toEqual({ groupId: 'group-1', encryptKeyId: 'key-1' });
    expect(await new MetadataStore(db, PREFS_DOCUMENT).read()).toEqual({ groupId: 'group-2', encryptKeyId: null });
  });

  it('should reject an unknown dataset and write nothing', async () => {
    await expect(
      applier.apply([
        rec('transactions', 'A', 'amount', 5, 1000),
        rec('budgets', 'b-1', 'name', 'x', 1001),
      ])
    ).rejects.toBeInstanceOf(UnsupportedSchemaError);

    expect(await ledger.get('transactions', 'A')).toBeNull();
    expect(await db.entries('msg:')).toEqual([]);
  });

  it('should reject an unknown column of a known dataset', async () => {
    await expect(applier.apply([rec('transactions', 'A', 'colour', 'red', 1000)])).rejects.toThrow(
      "Unsupported column 'colour' on dataset 'transactions'"
    );
    expect(await ledger.count('transactions')).toBe(0);
  });

  it('should merge into an existing row without dropping other fields', async () => {
    await applier.apply([
      rec('payees', 'p-1', 'name', 'Grocer', 1000),
      rec('payees', 'p-1', 'category', 'cat-1', 1001),
    ]);
    await applier.apply([rec('payees', 'p-1', 'tombstone', true, 2000)]);

    expect(await ledger.get('payees', 'p-1')).toEqual({
      id: 'p-1',
      name: 'Grocer',
      category: 'cat-1',
      tombstone: true,
    });
  });
});
