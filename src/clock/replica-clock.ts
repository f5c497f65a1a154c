/**
 * Replica Clock persistence
 *
 * The clock document lives outside the entity rows and is never journaled,
 * so saving it is not itself a replicated change.
 *
 * @module clock/replica-clock
 */

import type { ClientId } from '../types/index.js';
import type { KeyValueStore } from '../storage/database.js';
import { Timestamp } from './hlc.js';
import { makeClientId } from '../utils/uuid.js';
import { clockLogger } from '../utils/logger.js';

const CLOCK_KEY = 'clock';

export interface ReplicaClockState {
  clientId: ClientId;
  /** Last timestamp issued or observed by this replica */
  lastTimestamp: Timestamp;
  /** Newest remote timestamp applied */
  lastSyncedTimestamp: Timestamp | null;
  /** Opaque relay cursor past the last backlog applied; null before the first fetch */
  backlogCursor: string | null;
}

interface StoredClock {
  clientId: string;
  lastTimestamp: string;
  lastSyncedTimestamp: string | null;
  backlogCursor?: string | null;
}

function isStoredClock(value: unknown): value is StoredClock {
  return (
    typeof value === 'object' &&
    value !== null &&
    'clientId' in value &&
    typeof value.clientId === 'string' &&
    'lastTimestamp' in value &&
    typeof value.lastTimestamp === 'string' &&
    'lastSyncedTimestamp' in value &&
    (value.lastSyncedTimestamp === null || typeof value.lastSyncedTimestamp === 'string') &&
    (!('backlogCursor' in value) || value.backlogCursor === null || typeof value.backlogCursor === 'string')
  );
}

export class ReplicaClockStore {
  constructor(private readonly kv: KeyValueStore) {}

  async load(): Promise<ReplicaClockState | null> {
    const raw = await this.kv.get(CLOCK_KEY);
    if (raw === null) return null;

    const parsed: unknown = JSON.parse(raw);
    if (!isStoredClock(parsed)) {
      throw new Error('Replica clock document is corrupted');
    }
    const lastTimestamp = Timestamp.parse(parsed.lastTimestamp);
    if (!lastTimestamp) {
      throw new Error(`Replica clock holds a malformed timestamp '${parsed.lastTimestamp}'`);
    }
    return {
      clientId: parsed.clientId,
      lastTimestamp,
      lastSyncedTimestamp:
        parsed.lastSyncedTimestamp === null ? null : Timestamp.parse(parsed.lastSyncedTimestamp),
      backlogCursor: parsed.backlogCursor ?? null,
    };
  }

  async save(state: ReplicaClockState): Promise<void> {
    const stored: StoredClock = {
      clientId: state.clientId,
      lastTimestamp: state.lastTimestamp.toString(),
      lastSyncedTimestamp: state.lastSyncedTimestamp?.toString() ?? null,
      backlogCursor: state.backlogCursor,
    };
    await this.kv.put(CLOCK_KEY, JSON.stringify(stored));
  }

  /**
   * Load the clock, creating a fresh identity on first initialization
   */
  async getOrCreate(clientId: ClientId = makeClientId()): Promise<ReplicaClockState> {
    const existing = await this.load();
    if (existing) return existing;

    const state: ReplicaClockState = {
      clientId,
      lastTimestamp: Timestamp.zero.withClientId(clientId),
      lastSyncedTimestamp: null,
      backlogCursor: null,
    };
    await this.save(state);
    clockLogger.info('Created replica clock', { clientId });
    return state;
  }
}
