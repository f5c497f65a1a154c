/**
 * SHA3-256 fingerprints for change records
 * @module utils/hash
 */

import sha3 from 'js-sha3';
import type { Variant } from '../types/index.js';

const { sha3_256 } = sha3;

export type SHA3Hash = string;

export function hash(data: Uint8Array | string): SHA3Hash {
  return sha3_256(data);
}

/**
 * Fingerprint of a record's content without its timestamp.
 * Type-tagged so `1`, `"1"` and `true` never collide.
 */
export function contentHash(dataset: string, row: string, column: string, value: Variant): SHA3Hash {
  return hash(JSON.stringify([dataset, row, column, typeof value, value]));
}

export function isValidHash(str: string): boolean {
  return /^[a-f0-9]{64}$/.test(str);
}
