/**
 * Replica - one device's local copy of the ledger
 *
 * Owns the local database, the sync session (and through it the logical
 * clock and encryption context) and hands out editing sessions. State is
 * threaded through this object; nothing is held in module globals.
 *
 * @module replica/replica
 */

import type { ClientId, EntityRow, Variant, WallClock } from '../types/index.js';
import { DEFAULT_CONFIG, type ReplicaConfig } from '../config/index.js';
import { ReplicaClockStore } from '../clock/replica-clock.js';
import { deriveKey, makeKeyTest, makeSalt, unlockContext, type EncryptionContext } from '../crypto/envelope.js';
import { NotFoundError, SyncStateError } from '../errors/index.js';
import { EventBus } from '../events/event-bus.js';
import { ReplicaDatabase } from '../storage/database.js';
import { LedgerStore } from '../storage/ledger-store.js';
import { MetadataStore, PREFS_DOCUMENT, type MetadataDocument } from '../storage/metadata-store.js';
import { SchemaRegistry } from '../storage/schema.js';
import type { ChangeRecord } from '../sync/change-record.js';
import { MessageJournal, type JournalStats } from '../sync/message-journal.js';
import type { KeyRegistry, RelayTransport } from '../sync/relay.js';
import {
  ENCRYPT_KEY_ID_KEY,
  GROUP_ID_KEY,
  SyncSession,
  type SendResult,
  type SyncOptions,
  type SyncResult,
} from '../sync/sync-session.js';
import { createLogger } from '../utils/logger.js';
import { generateUUID } from '../utils/uuid.js';
import { EditSession } from './edit-session.js';

const logger = createLogger('replica');

export interface ReplicaOptions {
  transport: RelayTransport;
  keyRegistry: KeyRegistry;
  config?: Partial<ReplicaConfig>;
  /** LevelDB directory; defaults to `config.dataDir` */
  location?: string;
  /** Identity for a replica created for the first time */
  clientId?: ClientId;
  wallClock?: WallClock;
  schema?: SchemaRegistry;
  eventBus?: EventBus;
}

export interface CommitResult {
  records: ChangeRecord[];
  /** Null when the send was left to the next round */
  send: SendResult | null;
}

/**
 * @example
 * ```typescript
 * const relay = new InMemoryRelay();
 * const replica = await Replica.open({ location: './data/laptop', transport: relay, keyRegistry: relay });
 * await replica.register(relay.createGroup());
 *
 * const session = replica.edit();
 * session.set('accounts', 'acct-1', { name: 'Checking', offbudget: false });
 * await replica.commit(session);
 * ```
 */
export class Replica {
  readonly events: EventBus;
  readonly schema: SchemaRegistry;
  readonly config: ReplicaConfig;
  private closed = false;

  private constructor(
    private readonly db: ReplicaDatabase,
    readonly syncSession: SyncSession,
    private readonly keyRegistry: KeyRegistry,
    options: { schema: SchemaRegistry; config: ReplicaConfig; events: EventBus }
  ) {
    this.schema = options.schema;
    this.config = options.config;
    this.events = options.events;
  }

  static async open(options: ReplicaOptions): Promise<Replica> {
    const config: ReplicaConfig = { ...DEFAULT_CONFIG, ...options.config };
    const schema = options.schema ?? new SchemaRegistry();
    const events = options.eventBus ?? new EventBus();

    const db = new ReplicaDatabase({ location: options.location ?? config.dataDir });
    await db.open();
    const clockState = await db.transaction((tx) => new ReplicaClockStore(tx).getOrCreate(options.clientId));

    const session = new SyncSession({
      db,
      schema,
      transport: options.transport,
      clockState,
      wallClock: options.wallClock,
      maxClockSkewMs: config.maxClockSkewMs,
      eventBus: events,
    });

    logger.info('Opened replica', { clientId: clockState.clientId });
    return new Replica(db, session, options.keyRegistry, { schema, config, events });
  }

  get clientId(): ClientId {
    return this.syncSession.clock.clientId;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.db.close();
  }

  /**
   * Attach the replica to a relay group; later rounds send and receive
   */
  async register(groupId: string): Promise<void> {
    await this.db.transaction((tx) => new MetadataStore(tx).patch({ [GROUP_ID_KEY]: groupId }));
    logger.info('Registered replica with group', { groupId });
  }

  async getGroupId(): Promise<string | null> {
    return new MetadataStore(this.db).getString(GROUP_ID_KEY);
  }

  edit(): EditSession {
    return new EditSession(this.db, this.schema, async (buffer) => {
      const { records } = await this.syncSession.commitLocal(buffer);
      return records;
    });
  }

  /**
   * Commit the session locally, then send. The send is skipped while a round
   * is running or the sync session is in the error state; the records stay
   * in the outbox for the next round.
   */
  async commit(session: EditSession): Promise<CommitResult> {
    const records = await session.commit();
    if (records.length === 0 || this.syncSession.getState() !== 'idle') {
      return { records, send: null };
    }
    return { records, send: await this.syncSession.send() };
  }

  /** One full sync round */
  async sync(options?: SyncOptions): Promise<SyncResult> {
    return this.syncSession.sync(options);
  }

  /**
   * Create a key for the group and move the whole group onto it.
   *
   * Pulls the backlog first, registers the key, then replaces the relay's
   * log with this replica's journal sealed under the new key, so replicas
   * joining afterwards decrypt the full history. If the relay refuses the
   * replacement because a peer sent in between, the replica stays
   * unencrypted; reset the sync session and call this again.
   *
   * @throws {KeyDerivationError} on an empty password
   * @throws {TransportError} when the relay refuses the replacement
   */
  async enableEncryption(password: string): Promise<string> {
    const groupId = await this.getGroupId();
    if (groupId === null) {
      throw new SyncStateError(
        'Register the replica with a group before enabling encryption',
        this.syncSession.getState()
      );
    }

    const keyId = generateUUID();
    const salt = makeSalt();
    const masterKey = await deriveKey(password, salt, this.config.kdfIterations);
    const context: EncryptionContext = { keyId, masterKey, salt };

    await this.syncSession.sync();
    await this.keyRegistry.createKey(groupId, { keyId, salt, test: makeKeyTest(context) });
    await this.syncSession.reseal(context);
    await this.db.transaction((tx) => new MetadataStore(tx).patch({ [ENCRYPT_KEY_ID_KEY]: keyId }));
    this.syncSession.setEncryption(context);

    logger.info('Enabled encryption', { groupId, keyId });
    return keyId;
  }

  /**
   * Derive the group key from `password` and verify it against the registry
   *
   * @throws {KeyDerivationError} on an empty or wrong password
   * @throws {NotFoundError} when the group has no key
   */
  async unlock(password: string): Promise<void> {
    const groupId = await this.getGroupId();
    if (groupId === null) {
      throw new NotFoundError('group', 'unregistered replica');
    }
    const key = await this.keyRegistry.getKey(groupId);
    if (!key) {
      throw new NotFoundError('encryption key', groupId);
    }

    const context = await unlockContext(password, key, this.config.kdfIterations);
    await this.db.transaction((tx) => new MetadataStore(tx).patch({ [ENCRYPT_KEY_ID_KEY]: key.keyId }));
    this.syncSession.setEncryption(context);
    logger.info('Unlocked replica', { groupId, keyId: key.keyId });
  }

  /** True when the group is encrypted and this replica holds no key */
  async isLocked(): Promise<boolean> {
    const keyId = await new MetadataStore(this.db).getString(ENCRYPT_KEY_ID_KEY);
    return keyId !== null && !this.syncSession.isEncrypted();
  }

  async get(dataset: string, row: string): Promise<EntityRow | null> {
    return new LedgerStore(this.db, this.schema).get(dataset, row);
  }

  async list(dataset: string, predicate?: (row: EntityRow) => boolean): Promise<EntityRow[]> {
    return new LedgerStore(this.db, this.schema).list(dataset, predicate);
  }

  async getPref(key: string): Promise<Variant | undefined> {
    return new MetadataStore(this.db, PREFS_DOCUMENT).get(key);
  }

  async preferences(): Promise<MetadataDocument> {
    return new MetadataStore(this.db, PREFS_DOCUMENT).read();
  }

  async metadata(): Promise<MetadataDocument> {
    return new MetadataStore(this.db).read();
  }

  async journalStats(): Promise<JournalStats> {
    return new MessageJournal(this.db).getStats();
  }
}
