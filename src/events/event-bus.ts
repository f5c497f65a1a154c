/**
 * Event Bus - replica notifications
 *
 * Sync rounds, local commits and bank imports publish here so applications
 * can react (refresh views, run rules) without coupling to the engine.
 *
 * @module events/event-bus
 */

import { EventEmitter } from 'events';
import type { ApplyResult } from '../sync/merge-applier.js';

export type SyncState = 'idle' | 'sending' | 'awaiting-remote' | 'applying' | 'error';

/**
 * Payload of every event type
 */
export interface ReplicaEventMap {
  'sync:state_changed': { from: SyncState; to: SyncState };
  'sync:sent': { groupId: string; count: number };
  'sync:received': { groupId: string; count: number };
  'sync:applied': ApplyResult & { clock: string };
  'sync:error': { state: SyncState; error: string; code: string };
  'ledger:committed': { records: number; applied: number };
  'bank:imported': { accountId: string; created: number; matched: number; skipped: number };
}

export type ReplicaEventType = keyof ReplicaEventMap;

export interface ReplicaEvent<K extends ReplicaEventType = ReplicaEventType> {
  type: K;
  /** ISO 8601 */
  timestamp: string;
  /** Component that published the event */
  source: string;
  payload: ReplicaEventMap[K];
}

export type EventHandler<K extends ReplicaEventType = ReplicaEventType> = (event: ReplicaEvent<K>) => void;

export interface EventFilter {
  types?: ReplicaEventType[];
  source?: string;
}

export interface EventBusOptions {
  /** Events retained in history (default: 500) */
  maxHistory?: number;
  /** Keep a history at all (default: true) */
  enableHistory?: boolean;
  /** Default timeout for waitFor() in ms (default: 30000) */
  defaultWaitTimeout?: number;
}

/**
 * @example
 * ```typescript
 * const bus = new EventBus();
 * bus.subscribe('sync:applied', (event) => {
 *   console.log(`applied ${event.payload.applied} records`);
 * });
 * ```
 */
export class EventBus extends EventEmitter {
  private history: ReplicaEvent[] = [];
  private maxHistory: number;
  private historyEnabled: boolean;
  private defaultWaitTimeout: number;

  constructor(options?: EventBusOptions) {
    super();
    this.maxHistory = options?.maxHistory ?? 500;
    this.historyEnabled = options?.enableHistory ?? true;
    this.defaultWaitTimeout = options?.defaultWaitTimeout ?? 30000;
  }

  publish<K extends ReplicaEventType>(event: ReplicaEvent<K>): void {
    if (this.historyEnabled) {
      this.history.push(event);
      if (this.history.length > this.maxHistory) {
        this.history.splice(0, this.history.length - this.maxHistory);
      }
    }

    this.emit(event.type, event);
    this.emit('*', event);
  }

  /**
   * @returns Unsubscribe function
   */
  subscribe<K extends ReplicaEventType>(type: K, handler: EventHandler<K>): () => void {
    this.on(type, handler);
    return () => {
      this.off(type, handler);
    };
  }

  subscribeAll(handler: EventHandler): () => void {
    this.on('*', handler);
    return () => {
      this.off('*', handler);
    };
  }

  getEvents(filter?: EventFilter): ReplicaEvent[] {
    if (!filter) return [...this.history];
    return this.history.filter((event) => {
      if (filter.types && !filter.types.includes(event.type)) return false;
      if (filter.source && event.source !== filter.source) return false;
      return true;
    });
  }

  getRecentEvents(count: number): ReplicaEvent[] {
    return this.history.slice(-count);
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Resolve with the next matching event, or reject after the timeout
   */
  waitFor<K extends ReplicaEventType>(
    type: K,
    options?: { timeout?: number; filter?: (event: ReplicaEvent<K>) => boolean }
  ): Promise<ReplicaEvent<K>> {
    return new Promise((resolve, reject) => {
      const timeout = options?.timeout ?? this.defaultWaitTimeout;

      const handler: EventHandler<K> = (event) => {
        if (options?.filter && !options.filter(event)) return;
        clearTimeout(timeoutId);
        this.off(type, handler);
        resolve(event);
      };
      this.on(type, handler);

      const timeoutId = setTimeout(() => {
        this.off(type, handler);
        reject(new Error(`Timeout waiting for event: ${type} (${timeout}ms)`));
      }, timeout);
    });
  }
}

export function createEvent<K extends ReplicaEventType>(
  type: K,
  source: string,
  payload: ReplicaEventMap[K]
): ReplicaEvent<K> {
  return {
    type,
    timestamp: new Date().toISOString(),
    source,
    payload,
  };
}
