/**
 * In-process relay
 *
 * Stores change sets per group and hands them back to other clients, the way
 * the hosted relay does, without any network. Used by tests and by
 * applications that embed a local relay.
 *
 * @module sync/in-memory-relay
 */

import { decodeChangeSet, encodeChangeSet, type ChangeSet, type MessageEnvelope } from '../protocol/codec.js';
import { generateUUID } from '../utils/uuid.js';
import type { Backlog, KeyRegistry, RegisteredKey, RelayAck, RelayTransport, ReplaceAck } from './relay.js';

interface StoredEnvelope {
  /** Arrival order within the group */
  seq: number;
  clientId: string;
  keyId: string | null;
  envelope: MessageEnvelope;
}

interface GroupLog {
  envelopes: StoredEnvelope[];
  timestamps: Set<string>;
  /** Sequence of the newest envelope; 0 while empty */
  head: number;
  key: RegisteredKey | null;
}

export interface RelayCallCounts {
  sendChangeSet: number;
  fetchBacklog: number;
  replaceLog: number;
}

function parseCursor(cursor: string | null): number {
  if (cursor === null) return 0;
  const seq = Number(cursor);
  if (!Number.isInteger(seq) || seq < 0) {
    throw new Error(`Invalid backlog cursor '${cursor}'`);
  }
  return seq;
}

export class InMemoryRelay implements RelayTransport, KeyRegistry {
  private groups = new Map<string, GroupLog>();
  private pendingFailure: Error | null = null;
  readonly calls: RelayCallCounts = { sendChangeSet: 0, fetchBacklog: 0, replaceLog: 0 };

  /** New empty group; returns its id */
  createGroup(groupId: string = generateUUID()): string {
    this.group(groupId);
    return groupId;
  }

  /** Make the next transport call reject with `error` */
  failNext(error: Error = new Error('relay unavailable')): void {
    this.pendingFailure = error;
  }

  async sendChangeSet(groupId: string, keyId: string | null, payload: Uint8Array): Promise<RelayAck> {
    this.calls.sendChangeSet++;
    this.takeFailure();

    const log = this.group(groupId);
    const changeSet = this.decodeForKey(log, groupId, keyId, payload);
    return { accepted: this.append(log, changeSet) };
  }

  /**
   * Envelopes stored after `cursor`, grouped into change sets of consecutive
   * envelopes sharing a sender and key, in arrival order
   */
  async fetchBacklog(groupId: string, cursor: string | null): Promise<Backlog> {
    this.calls.fetchBacklog++;
    this.takeFailure();

    const log = this.group(groupId);
    const after = parseCursor(cursor);
    const stored = log.envelopes.filter((s) => s.seq > after);

    const changeSets: Uint8Array[] = [];
    let batch: StoredEnvelope[] = [];
    const flush = (): void => {
      if (batch.length === 0) return;
      changeSets.push(
        encodeChangeSet({
          clientId: batch[0].clientId,
          groupId,
          keyId: batch[0].keyId,
          messages: batch.map((s) => s.envelope),
        })
      );
      batch = [];
    };
    for (const item of stored) {
      if (batch.length > 0 && (batch[0].clientId !== item.clientId || batch[0].keyId !== item.keyId)) {
        flush();
      }
      batch.push(item);
    }
    flush();
    return { changeSets, cursor: String(log.head) };
  }

  async replaceLog(
    groupId: string,
    keyId: string | null,
    payload: Uint8Array,
    expectedCursor: string | null
  ): Promise<ReplaceAck> {
    this.calls.replaceLog++;
    this.takeFailure();

    const log = this.group(groupId);
    if (parseCursor(expectedCursor) !== log.head) {
      throw new Error(`Group ${groupId} received change sets after cursor ${expectedCursor ?? 'null'}`);
    }
    const changeSet = this.decodeForKey(log, groupId, keyId, payload);

    log.envelopes = [];
    log.timestamps.clear();
    const accepted = this.append(log, changeSet);
    return { accepted, cursor: String(log.head) };
  }

  async createKey(groupId: string, key: RegisteredKey): Promise<void> {
    this.group(groupId).key = key;
  }

  async getKey(groupId: string): Promise<RegisteredKey | null> {
    return this.groups.get(groupId)?.key ?? null;
  }

  /** Envelopes stored for a group */
  size(groupId: string): number {
    return this.groups.get(groupId)?.envelopes.length ?? 0;
  }

  private decodeForKey(log: GroupLog, groupId: string, keyId: string | null, payload: Uint8Array): ChangeSet {
    const changeSet = decodeChangeSet(payload);
    const expectedKey = log.key?.keyId ?? null;
    if (keyId !== expectedKey || changeSet.keyId !== expectedKey) {
      throw new Error(`Key id mismatch for group ${groupId}`);
    }
    return changeSet;
  }

  /** Store envelopes not seen before; timestamps are unique per group */
  private append(log: GroupLog, changeSet: ChangeSet): number {
    let accepted = 0;
    for (const envelope of changeSet.messages) {
      if (log.timestamps.has(envelope.timestamp)) continue;
      log.timestamps.add(envelope.timestamp);
      log.envelopes.push({ seq: ++log.head, clientId: changeSet.clientId, keyId: changeSet.keyId, envelope });
      accepted++;
    }
    return accepted;
  }

  private group(groupId: string): GroupLog {
    let log = this.groups.get(groupId);
    if (!log) {
      log = { envelopes: [], timestamps: new Set(), head: 0, key: null };
      this.groups.set(groupId, log);
    }
    return log;
  }

  private takeFailure(): void {
    const failure = this.pendingFailure;
    if (failure) {
      this.pendingFailure = null;
      throw failure;
    }
  }
}
