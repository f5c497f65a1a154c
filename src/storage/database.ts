/**
 * Replica Database - LevelDB holding every piece of local replica state
 *
 * Entity rows, the message journal, the metadata document and the replica
 * clock live under disjoint key prefixes of one LevelDB, so a single batch can
 * commit all of them atomically.
 *
 * @module storage/database
 */

import { Level } from 'level';
import * as fs from 'fs/promises';
import { storeLogger } from '../utils/logger.js';

/**
 * Minimal string key/value surface shared by the database and transactions
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  del(key: string): Promise<void>;
  /** Entries whose key starts with `prefix`, in key order */
  entries(prefix: string): Promise<Array<[string, string]>>;
}

function isNotFound(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  return ('code' in err && err.code === 'LEVEL_NOT_FOUND') || ('notFound' in err && err.notFound === true);
}

type BatchOp = { type: 'put'; key: string; value: string } | { type: 'del'; key: string };

/**
 * Staged writes over a database snapshot.
 *
 * Reads see the transaction's own writes. Nothing reaches disk until
 * `ReplicaDatabase.transaction` commits the whole batch.
 */
export class KeyValueTransaction implements KeyValueStore {
  private staged = new Map<string, string | null>();

  constructor(private readonly base: ReplicaDatabase) {}

  async get(key: string): Promise<string | null> {
    const staged = this.staged.get(key);
    if (staged !== undefined) return staged;
    return this.base.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.staged.set(key, value);
  }

  async del(key: string): Promise<void> {
    this.staged.set(key, null);
  }

  async entries(prefix: string): Promise<Array<[string, string]>> {
    const merged = new Map(await this.base.entries(prefix));
    for (const [key, value] of this.staged) {
      if (!key.startsWith(prefix)) continue;
      if (value === null) merged.delete(key);
      else merged.set(key, value);
    }
    return Array.from(merged.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  get size(): number {
    return this.staged.size;
  }

  operations(): BatchOp[] {
    return Array.from(this.staged, ([key, value]): BatchOp =>
      value === null ? { type: 'del', key } : { type: 'put', key, value }
    );
  }
}

export interface ReplicaDatabaseOptions {
  /** Directory of the LevelDB */
  location: string;
}

/**
 * ReplicaDatabase
 *
 * @example
 * ```typescript
 * const db = new ReplicaDatabase({ location: './data/replica' });
 * await db.open();
 * await db.transaction(async (tx) => {
 *   await tx.put('meta', '{}');
 * });
 * ```
 */
export class ReplicaDatabase implements KeyValueStore {
  private db: Level<string, string>;
  private location: string;
  private opened = false;
  private txLock: Promise<void> = Promise.resolve();

  constructor(options: ReplicaDatabaseOptions) {
    this.location = options.location;
    this.db = new Level<string, string>(options.location, { valueEncoding: 'utf8' });
  }

  async open(): Promise<void> {
    if (this.opened) return;
    await fs.mkdir(this.location, { recursive: true });
    await this.db.open();
    this.opened = true;
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    await this.txLock;
    await this.db.close();
    this.opened = false;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async put(key: string, value: string): Promise<void> {
    await this.db.put(key, value);
  }

  async del(key: string): Promise<void> {
    await this.db.del(key);
  }

  async entries(prefix: string): Promise<Array<[string, string]>> {
    const result: Array<[string, string]> = [];
    for await (const [key, value] of this.db.iterator({ gte: prefix, lt: prefix + '\xFF' })) {
      result.push([key, value]);
    }
    return result;
  }

  /**
   * Run `fn` against a staged transaction and commit its writes as one
   * atomic batch. Transactions run one at a time; if `fn` throws nothing is
   * written.
   */
  async transaction<T>(fn: (tx: KeyValueTransaction) => Promise<T>): Promise<T> {
    const previous = this.txLock;
    let release: () => void = () => {};
    this.txLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      const tx = new KeyValueTransaction(this);
      const result = await fn(tx);
      if (tx.size > 0) {
        await this.db.batch(tx.operations());
        storeLogger.debug('Committed transaction', { writes: tx.size });
      }
      return result;
    } finally {
      release();
    }
  }
}
