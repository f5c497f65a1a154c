/**
 * Relay collaborator interfaces
 *
 * The relay stores and redistributes change sets without resolving
 * conflicts. HTTP transport and authentication live behind these
 * interfaces, outside this package.
 *
 * @module sync/relay
 */

import type { KeyTest } from '../crypto/envelope.js';

export interface RelayAck {
  /** Envelopes stored by the relay */
  accepted: number;
}

export interface ReplaceAck extends RelayAck {
  /** Backlog cursor just past the replacement */
  cursor: string;
}

/**
 * Change sets the relay stored after a cursor, with the cursor to ask from
 * next time. Cursors are opaque to the replica and count arrivals at the
 * relay, not record timestamps.
 */
export interface Backlog {
  changeSets: Uint8Array[];
  cursor: string;
}

export interface RelayTransport {
  /**
   * Store one encoded change set for the group
   */
  sendChangeSet(groupId: string, keyId: string | null, payload: Uint8Array): Promise<RelayAck>;

  /**
   * Everything stored after `cursor`, or the whole log when `cursor` is null
   */
  fetchBacklog(groupId: string, cursor: string | null): Promise<Backlog>;

  /**
   * Swap the group's whole log for `payload`. Rejects when anything was
   * stored after `expectedCursor`.
   */
  replaceLog(
    groupId: string,
    keyId: string | null,
    payload: Uint8Array,
    expectedCursor: string | null
  ): Promise<ReplaceAck>;
}

export interface RegisteredKey {
  keyId: string;
  /** base64 */
  salt: string;
  /** Known value sealed under the key, used to check passwords */
  test: KeyTest;
}

export interface KeyRegistry {
  createKey(groupId: string, key: RegisteredKey): Promise<void>;
  getKey(groupId: string): Promise<RegisteredKey | null>;
}
