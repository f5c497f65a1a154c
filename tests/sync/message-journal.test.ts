/**
 * MessageJournal Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReplicaDatabase } from '../../src/storage/database.js';
import { MessageJournal } from '../../src/sync/message-journal.js';
import { createChangeRecord } from '../../src/sync/change-record.js';
import { Timestamp } from '../../src/clock/hlc.js';
import type { Variant } from '../../src/types/index.js';
import { safeRemoveDir, testDir } from '../helpers/test-dirs.js';

const A = '000000000000000A';
const B = '000000000000000B';

function amount(value: Variant, millis: number, client = A) {
  return createChangeRecord(
    { dataset: 'transactions', row: 'tx-1', column: 'amount', value },
    new Timestamp(millis, 0, client)
  );
}

describe('MessageJournal', () => {
  let db: ReplicaDatabase;
  let journal: MessageJournal;
  let dir: string;

  beforeEach(async () => {
    dir = testDir('journal');
    db = new ReplicaDatabase({ location: dir });
    await db.open();
    journal = new MessageJournal(db);
  });

  afterEach(async () => {
    await db.close();
    await safeRemoveDir(dir);
  });

  describe('record', () => {
    it('should apply a first write and make it the cell writer', async () => {
      const record = amount(100, 1000);

      expect(await journal.record(record)).toBe('applied');
      expect(await journal.cellWriter('transactions', 'tx-1', 'amount')).toBe(record.timestamp.toString());
    });

    it('should report a journaled timestamp as duplicate', async () => {
      await journal.record(amount(100, 1000));
      expect(await journal.record(amount(100, 1000))).toBe('duplicate');
    });

    it('should journal an older record as stale without taking the cell', async () => {
      const newer = amount(200, 2000);
      await journal.record(newer);

      expect(await journal.record(amount(100, 1000, B))).toBe('stale');
      expect(await journal.cellWriter('transactions', 'tx-1', 'amount')).toBe(newer.timestamp.toString());
      expect(await journal.get(amount(100, 1000, B).timestamp.toString())).not.toBeNull();
    });

    it('should let a newer record take over the cell', async () => {
      await journal.record(amount(100, 1000));
      expect(await journal.record(amount(200, 2000, B))).toBe('applied');
    });
  });

  describe('outbox', () => {
    it('should return pending local records in timestamp order', async () => {
      await journal.record(amount(300, 3000), { outbox: true });
      await journal.record(amount(100, 1000), { outbox: true });
      await journal.record(amount(200, 2000, B));

      const pending = await journal.pending();
      expect(pending.map((r) => r.value)).toEqual([100, 300]);
      expect(pending[0].timestamp.toString()).toBe(new Timestamp(1000, 0, A).toString());
    });

    it('should drop acknowledged records from the outbox on markSent', async () => {
      const first = amount(100, 1000);
      const second = amount(300, 3000);
      await journal.record(first, { outbox: true });
      await journal.record(second, { outbox: true });

      const changed = await journal.markSent([first.timestamp.toString(), 'unknown']);

      expect(changed).toBe(1);
      expect((await journal.pending()).map((r) => r.value)).toEqual([300]);
      expect((await db.entries('out:')).map(([key]) => key)).toEqual([`out:${second.timestamp.toString()}`]);
      expect(await journal.get(first.timestamp.toString())).not.toBeNull();
    });

    it('should index only local records under the outbox prefix', async () => {
      await journal.record(amount(100, 1000), { outbox: true });
      await journal.record(amount(200, 2000, B));
      await journal.record(amount(100, 1000), { outbox: true });

      expect(await db.entries('out:')).toEqual([[`out:${new Timestamp(1000, 0, A).toString()}`, '']]);
    });
  });

  it('should return the whole history in timestamp order', async () => {
    await journal.record(amount(200, 2000, B));
    await journal.record(amount(100, 1000), { outbox: true });
    await journal.markSent([new Timestamp(1000, 0, A).toString()]);

    const history = await journal.history();

    expect(history.map((r) => [r.value, r.timestamp.clientId])).toEqual([
      [100, A],
      [200, B],
    ]);
  });

  it('should count entries per dataset', async () => {
    await journal.record(amount(100, 1000), { outbox: true });
    await journal.record(
      createChangeRecord(
        { dataset: 'payees', row: 'p-1', column: 'name', value: 'Grocer' },
        new Timestamp(1500, 0, A)
      )
    );

    expect(await journal.getStats()).toEqual({
      totalEntries: 2,
      pending: 1,
      byDataset: { transactions: 1, payees: 1 },
    });
  });
});
