/**
 * Sync Session - one replica's exchange with the relay
 *
 * State machine:
 *
 *   idle -> sending -> awaiting-remote -> applying -> idle
 *
 * Any failure moves the session to `error`, which absorbs every further round
 * until `reset()`. A round can be abandoned through an AbortSignal up to the
 * start of `applying`; from there it commits atomically or not at all.
 *
 * Remote records are applied and the replica clock is advanced in the same
 * store transaction, so the persisted clock never runs ahead of what was
 * durably applied. The relay's backlog cursor is saved in that transaction
 * too.
 *
 * @module sync/sync-session
 */

import type { WallClock } from '../types/index.js';
import { HybridLogicalClock, Timestamp } from '../clock/hlc.js';
import { ReplicaClockStore, type ReplicaClockState } from '../clock/replica-clock.js';
import type { EncryptionContext } from '../crypto/envelope.js';
import {
  KeyDerivationError,
  SyncAbortedError,
  SyncStateError,
  TransportError,
  isReplicaError,
  toReplicaError,
  type ReplicaError,
} from '../errors/index.js';
import { createEvent, type EventBus, type ReplicaEventMap, type ReplicaEventType, type SyncState } from '../events/event-bus.js';
import { buildChangeSet, openChangeSet } from '../protocol/change-set.js';
import type { KeyValueStore, ReplicaDatabase } from '../storage/database.js';
import { MetadataStore } from '../storage/metadata-store.js';
import type { SchemaRegistry } from '../storage/schema.js';
import { errorData, syncLogger } from '../utils/logger.js';
import type { ChangeBuffer } from './change-buffer.js';
import { compareRecords, type ChangeRecord } from './change-record.js';
import { MergeApplier, type ApplyResult } from './merge-applier.js';
import { MessageJournal } from './message-journal.js';
import type { RelayTransport, ReplaceAck } from './relay.js';

/** Metadata key holding the relay group id */
export const GROUP_ID_KEY = 'groupId';
/** Metadata key holding the id of the group's encryption key */
export const ENCRYPT_KEY_ID_KEY = 'encryptKeyId';

export interface SyncSessionOptions {
  db: ReplicaDatabase;
  schema: SchemaRegistry;
  transport: RelayTransport;
  clockState: ReplicaClockState;
  encryption?: EncryptionContext | null;
  wallClock?: WallClock;
  maxClockSkewMs?: number;
  eventBus?: EventBus;
}

export interface SendResult {
  /** Records handed to the relay */
  sent: number;
  /** Records the relay stored */
  accepted: number;
  /** True when the replica has no group id yet */
  skipped: boolean;
}

export interface SyncResult {
  send: SendResult;
  /** Remote records decoded from the backlog */
  received: number;
  apply: ApplyResult;
  /** Replica clock after the round */
  clock: Timestamp;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

interface RemoteBatch {
  records: ChangeRecord[];
  /** Relay cursor past this batch */
  cursor: string | null;
}

const EMPTY_APPLY: ApplyResult = { applied: 0, stale: 0, duplicates: 0, prefs: 0, rowWrites: 0 };

export class SyncSession {
  readonly clock: HybridLogicalClock;
  private state: SyncState = 'idle';
  private lastError: ReplicaError | null = null;
  private clockState: ReplicaClockState;
  private encryption: EncryptionContext | null;
  private db: ReplicaDatabase;
  private transport: RelayTransport;
  private applier: MergeApplier;
  private eventBus?: EventBus;
  private logger = syncLogger.child('session');

  constructor(options: SyncSessionOptions) {
    this.db = options.db;
    this.transport = options.transport;
    this.clockState = options.clockState;
    this.encryption = options.encryption ?? null;
    this.applier = new MergeApplier(options.db, options.schema);
    this.eventBus = options.eventBus;
    this.clock = new HybridLogicalClock(options.clockState.lastTimestamp, {
      wallClock: options.wallClock,
      maxSkewMs: options.maxClockSkewMs,
    });
  }

  getState(): SyncState {
    return this.state;
  }

  getLastError(): ReplicaError | null {
    return this.lastError;
  }

  getClockState(): ReplicaClockState {
    return { ...this.clockState, lastTimestamp: this.clock.last };
  }

  isEncrypted(): boolean {
    return this.encryption !== null;
  }

  setEncryption(encryption: EncryptionContext | null): void {
    this.encryption = encryption;
  }

  /**
   * Leave the `error` state
   *
   * @throws {SyncStateError} while a round is in flight
   */
  reset(): void {
    if (this.state === 'idle') return;
    if (this.state !== 'error') {
      throw new SyncStateError(`Cannot reset while ${this.state}`, this.state);
    }
    this.lastError = null;
    this.transition('idle');
  }

  /**
   * Send every outbox record. A no-op when the replica has no group id.
   */
  async send(): Promise<SendResult> {
    this.begin('sending');
    try {
      const result = await this.sendPending();
      this.transition('idle');
      return result;
    } catch (err) {
      throw this.fail(err);
    }
  }

  /**
   * Fetch and decode the backlog without applying it
   */
  async receive(): Promise<ChangeRecord[]> {
    this.begin('awaiting-remote');
    try {
      const groupId = await new MetadataStore(this.db).getString(GROUP_ID_KEY);
      const records = groupId === null ? [] : (await this.fetchRemote(groupId)).records;
      this.transition('idle');
      return records;
    } catch (err) {
      throw this.fail(err);
    }
  }

  /**
   * One full round: send the outbox, fetch the backlog, apply it.
   *
   * @throws {SyncAbortedError} when `signal` fires before applying starts;
   * the session returns to idle and nothing remote was applied
   */
  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    this.begin('sending');
    try {
      const send = await this.sendPending();
      this.checkAborted(options.signal);

      this.transition('awaiting-remote');
      const batch: RemoteBatch = send.skipped
        ? { records: [], cursor: this.clockState.backlogCursor }
        : await this.fetchRemote(await this.requireGroupId());
      const records = batch.records;
      this.checkAborted(options.signal);

      this.transition('applying');
      const apply = await this.applyRemote(batch);
      this.transition('idle');

      this.logger.info('Sync round completed', {
        sent: send.sent,
        received: records.length,
        applied: apply.applied,
      });
      return { send, received: records.length, apply, clock: this.clock.last };
    } catch (err) {
      if (err instanceof SyncAbortedError) {
        this.logger.info('Sync round aborted', { phase: err.details?.phase });
        this.transition('idle');
        throw err;
      }
      throw this.fail(err);
    }
  }

  /**
   * Stamp the buffer's edits, apply them locally and queue them in the
   * outbox, all in one transaction together with the advanced clock.
   */
  async commitLocal(buffer: ChangeBuffer): Promise<{ records: ChangeRecord[]; apply: ApplyResult }> {
    if (buffer.isEmpty()) return { records: [], apply: { ...EMPTY_APPLY } };

    const edits = buffer.entries();
    let outcome: { records: ChangeRecord[]; apply: ApplyResult };
    try {
      outcome = await this.db.transaction(async (tx) => {
        const records = buffer.flush(this.clock);
        const apply = await this.applier.applyIn(tx, records, { outbox: true });
        await this.saveClock(tx, { ...this.clockState, lastTimestamp: this.clock.last });
        return { records, apply };
      });
    } catch (err) {
      // nothing was written; give the edits back so the caller can retry
      buffer.clear();
      for (const edit of edits) buffer.record(edit.dataset, edit.row, edit.column, edit.value);
      throw err;
    }

    this.logger.debug('Committed local edits', { records: outcome.records.length });
    this.publish('ledger:committed', { records: outcome.records.length, applied: outcome.apply.applied });
    return outcome;
  }

  /**
   * Replace the group's relay log with this replica's whole journal sealed
   * under `encryption`, so replicas joining later can read all of it.
   *
   * The relay refuses the replacement if change sets arrived after this
   * replica's backlog cursor; run `sync()` first.
   */
  async reseal(encryption: EncryptionContext): Promise<SendResult> {
    this.begin('sending');
    try {
      const groupId = await this.requireGroupId();
      const history = await new MessageJournal(this.db).history();
      const payload = buildChangeSet(history, { clientId: this.clock.clientId, groupId, encryption });

      let ack: ReplaceAck;
      try {
        ack = await this.transport.replaceLog(groupId, encryption.keyId, payload, this.clockState.backlogCursor);
      } catch (err) {
        throw isReplicaError(err)
          ? err
          : new TransportError('Relay refused to replace the group log', err, { groupId });
      }

      const state: ReplicaClockState = {
        ...this.clockState,
        lastTimestamp: this.clock.last,
        backlogCursor: ack.cursor,
      };
      await this.db.transaction(async (tx) => {
        const journal = new MessageJournal(tx);
        const pending = await journal.pending();
        await journal.markSent(pending.map((r) => r.timestamp.toString()));
        await this.saveClock(tx, state);
      });
      this.clockState = state;

      this.logger.info('Resealed group log', { groupId, keyId: encryption.keyId, records: history.length });
      this.publish('sync:sent', { groupId, count: history.length });
      this.transition('idle');
      return { sent: history.length, accepted: ack.accepted, skipped: false };
    } catch (err) {
      throw this.fail(err);
    }
  }

  private async sendPending(): Promise<SendResult> {
    const metadata = new MetadataStore(this.db);
    const groupId = await metadata.getString(GROUP_ID_KEY);
    if (groupId === null) {
      this.logger.debug('No group id, keeping edits local');
      return { sent: 0, accepted: 0, skipped: true };
    }
    const keyId = await metadata.getString(ENCRYPT_KEY_ID_KEY);
    if (keyId !== null && this.encryption?.keyId !== keyId) {
      throw new KeyDerivationError('Replica is encrypted and locked; unlock it before syncing', { keyId });
    }

    const pending = await new MessageJournal(this.db).pending();
    if (pending.length === 0) {
      return { sent: 0, accepted: 0, skipped: false };
    }

    const payload = buildChangeSet(pending, {
      clientId: this.clock.clientId,
      groupId,
      encryption: this.encryption,
    });

    let accepted: number;
    try {
      const ack = await this.transport.sendChangeSet(groupId, this.encryption?.keyId ?? null, payload);
      accepted = ack.accepted;
    } catch (err) {
      throw isReplicaError(err) ? err : new TransportError('Relay rejected change set', err, { groupId });
    }

    await this.db.transaction((tx) =>
      new MessageJournal(tx).markSent(pending.map((r) => r.timestamp.toString()))
    );

    this.logger.info('Sent change set', { groupId, sent: pending.length, accepted });
    this.publish('sync:sent', { groupId, count: pending.length });
    return { sent: pending.length, accepted, skipped: false };
  }

  /**
   * Decode the whole backlog before returning anything; one bad envelope
   * fails the round. Change sets this replica sent itself are skipped.
   */
  private async fetchRemote(groupId: string): Promise<RemoteBatch> {
    const cursor = this.clockState.backlogCursor;

    let changeSets: Uint8Array[];
    let next: string;
    try {
      const backlog = await this.transport.fetchBacklog(groupId, cursor);
      changeSets = backlog.changeSets;
      next = backlog.cursor;
    } catch (err) {
      throw isReplicaError(err) ? err : new TransportError('Relay backlog fetch failed', err, { groupId, cursor });
    }

    const records: ChangeRecord[] = [];
    let own = 0;
    for (const payload of changeSets) {
      const opened = openChangeSet(payload, this.encryption, { skipClientId: this.clock.clientId });
      if (opened.changeSet.clientId === this.clock.clientId) own++;
      records.push(...opened.records);
    }
    records.sort(compareRecords);

    this.logger.info('Received backlog', { groupId, changeSets: changeSets.length, own, records: records.length });
    this.publish('sync:received', { groupId, count: records.length });
    return { records, cursor: next };
  }

  private async applyRemote(batch: RemoteBatch): Promise<ApplyResult> {
    const { records, cursor } = batch;
    if (records.length === 0) {
      if (cursor !== this.clockState.backlogCursor) {
        const state: ReplicaClockState = { ...this.clockState, lastTimestamp: this.clock.last, backlogCursor: cursor };
        await this.db.transaction((tx) => this.saveClock(tx, state));
        this.clockState = state;
      }
      return { ...EMPTY_APPLY };
    }

    const newest = records[records.length - 1].timestamp;

    const { apply, state } = await this.db.transaction(async (tx) => {
      const merged = this.clock.peekReceive(newest);
      const lastSynced = this.clockState.lastSyncedTimestamp;
      const state: ReplicaClockState = {
        ...this.clockState,
        lastTimestamp: merged,
        lastSyncedTimestamp: lastSynced === null ? newest : Timestamp.max(lastSynced, newest),
        backlogCursor: cursor,
      };
      const apply = await this.applier.applyIn(tx, records);
      await this.saveClock(tx, state);
      return { apply, state };
    });

    this.clockState = state;
    this.clock.observe(state.lastTimestamp);
    this.publish('sync:applied', { ...apply, clock: this.clock.last.toString() });
    return apply;
  }

  private async saveClock(kv: KeyValueStore, state: ReplicaClockState): Promise<void> {
    await new ReplicaClockStore(kv).save(state);
  }

  private async requireGroupId(): Promise<string> {
    const groupId = await new MetadataStore(this.db).getString(GROUP_ID_KEY);
    if (groupId === null) {
      throw new SyncStateError('Replica lost its group id during a round', this.state);
    }
    return groupId;
  }

  private checkAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new SyncAbortedError(this.state);
    }
  }

  private begin(next: SyncState): void {
    if (this.state === 'error') {
      throw new SyncStateError('Sync session is in the error state; call reset() first', this.state);
    }
    if (this.state !== 'idle') {
      throw new SyncStateError(`A sync round is already ${this.state}`, this.state);
    }
    this.transition(next);
  }

  private transition(next: SyncState): void {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    this.logger.debug('Sync state changed', { from, to: next });
    this.publish('sync:state_changed', { from, to: next });
  }

  private fail(err: unknown): ReplicaError {
    const error = toReplicaError(err);
    const state = this.state;
    this.lastError = error;
    this.logger.error('Sync round failed', { state, ...errorData(error) });
    this.publish('sync:error', { state, error: error.message, code: error.code });
    this.transition('error');
    return error;
  }

  private publish<K extends ReplicaEventType>(type: K, payload: ReplicaEventMap[K]): void {
    this.eventBus?.publish(createEvent(type, 'sync-session', payload));
  }
}
