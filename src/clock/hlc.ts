/**
 * Hybrid Logical Clock
 *
 * Orders events across replicas without synchronized wall clocks.
 * A timestamp is (millis, counter, clientId); its string form is fixed width,
 * so comparing strings gives the same order as comparing timestamps.
 *
 * @module clock/hlc
 */

import type { ClientId, WallClock } from '../types/index.js';
import { ClockOverflowError } from '../errors/index.js';
import { clockLogger, type Logger } from '../utils/logger.js';

const MAX_COUNTER = 0xffff;
const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z)-([0-9A-F]{4})-([0-9A-F]{16})$/;

/**
 * Immutable logical timestamp
 *
 * @example
 * ```typescript
 * const ts = new Timestamp(Date.UTC(2024, 0, 1), 0, '0123456789ABCDEF');
 * ts.toString(); // '2024-01-01T00:00:00.000Z-0000-0123456789ABCDEF'
 * ```
 */
export class Timestamp {
  readonly millis: number;
  readonly counter: number;
  readonly clientId: ClientId;

  constructor(millis: number, counter: number, clientId: ClientId) {
    this.millis = millis;
    this.counter = counter;
    this.clientId = clientId;
  }

  static readonly zero = new Timestamp(0, 0, '0000000000000000');

  /**
   * Parse the serialized form; null when malformed
   */
  static parse(value: string): Timestamp | null {
    const match = TIMESTAMP_PATTERN.exec(value);
    if (!match) return null;

    const millis = Date.parse(match[1]);
    if (!Number.isFinite(millis) || new Date(millis).toISOString() !== match[1]) {
      return null;
    }
    return new Timestamp(millis, parseInt(match[2], 16), match[3]);
  }

  static max(...timestamps: Timestamp[]): Timestamp | null {
    let best: Timestamp | null = null;
    for (const ts of timestamps) {
      if (best === null || ts.compare(best) > 0) best = ts;
    }
    return best;
  }

  /**
   * Negative, zero or positive like a sort comparator
   */
  compare(other: Timestamp): number {
    if (this.millis !== other.millis) return this.millis < other.millis ? -1 : 1;
    if (this.counter !== other.counter) return this.counter < other.counter ? -1 : 1;
    if (this.clientId === other.clientId) return 0;
    return this.clientId < other.clientId ? -1 : 1;
  }

  equals(other: Timestamp): boolean {
    return this.compare(other) === 0;
  }

  withClientId(clientId: ClientId): Timestamp {
    return new Timestamp(this.millis, this.counter, clientId);
  }

  toString(): string {
    return [
      new Date(this.millis).toISOString(),
      this.counter.toString(16).toUpperCase().padStart(4, '0'),
      this.clientId,
    ].join('-');
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Next local timestamp for an event happening now.
 *
 * millis = max(wall, last.millis); the counter continues only while millis
 * stays the same.
 */
export function nextTimestamp(last: Timestamp, wallMillis: number): Timestamp {
  const millis = Math.max(last.millis, wallMillis);
  const counter = millis === last.millis ? last.counter + 1 : 0;
  if (counter > MAX_COUNTER) {
    throw new ClockOverflowError(millis);
  }
  return new Timestamp(millis, counter, last.clientId);
}

/**
 * Local timestamp after observing `remote`.
 *
 * millis = max(local, remote, wall). The counter continues from whichever
 * input shares the resulting millis, so the result is strictly after both
 * inputs; it resets to 0 when the wall clock is ahead of both.
 */
export function mergeTimestamp(local: Timestamp, remote: Timestamp, wallMillis: number): Timestamp {
  const millis = Math.max(local.millis, remote.millis, wallMillis);

  let counter: number;
  if (millis === local.millis && millis === remote.millis) {
    counter = Math.max(local.counter, remote.counter) + 1;
  } else if (millis === local.millis) {
    counter = local.counter + 1;
  } else if (millis === remote.millis) {
    counter = remote.counter + 1;
  } else {
    counter = 0;
  }

  if (counter > MAX_COUNTER) {
    throw new ClockOverflowError(millis);
  }
  return new Timestamp(millis, counter, local.clientId);
}

export interface HybridClockOptions {
  wallClock?: WallClock;
  /** Remote timestamps further ahead than this are logged, then absorbed */
  maxSkewMs?: number;
  logger?: Logger;
}

/**
 * Stateful clock for one replica.
 *
 * Holds the last issued timestamp in memory; persisting it is the owner's job
 * (see ReplicaClockStore).
 */
export class HybridLogicalClock {
  private current: Timestamp;
  private wallClock: WallClock;
  private maxSkewMs: number;
  private logger: Logger;

  constructor(last: Timestamp, options: HybridClockOptions = {}) {
    this.current = last;
    this.wallClock = options.wallClock ?? Date.now;
    this.maxSkewMs = options.maxSkewMs ?? Number.POSITIVE_INFINITY;
    this.logger = options.logger ?? clockLogger;
  }

  get clientId(): ClientId {
    return this.current.clientId;
  }

  get last(): Timestamp {
    return this.current;
  }

  now(): Timestamp {
    this.current = nextTimestamp(this.current, this.wallClock());
    return this.current;
  }

  receive(remote: Timestamp): Timestamp {
    this.current = this.peekReceive(remote);
    return this.current;
  }

  /**
   * Clock that would result from `receive(remote)`, without mutating this one
   */
  peekReceive(remote: Timestamp): Timestamp {
    const wall = this.wallClock();
    if (remote.millis - wall > this.maxSkewMs) {
      this.logger.warn('Absorbing remote timestamp ahead of wall clock', {
        remote: remote.toString(),
        skewMs: remote.millis - wall,
      });
    }
    return mergeTimestamp(this.current, remote, wall);
  }

  /**
   * Move forward to `timestamp` if it is later than the last one; never
   * moves backwards.
   */
  observe(timestamp: Timestamp): Timestamp {
    if (timestamp.compare(this.current) > 0) {
      this.current = timestamp.withClientId(this.current.clientId);
    }
    return this.current;
  }
}
