/**
 * Identifier generation
 * @module utils/uuid
 */

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import type { ClientId } from '../types/index.js';

export function generateUUID(): string {
  return uuidv4();
}

export function isValidUUID(str: string): boolean {
  return uuidValidate(str);
}

/**
 * New replica identity: the last 16 hex digits of a random UUID, upper case
 */
export function makeClientId(): ClientId {
  return uuidv4().replace(/-/g, '').slice(-16).toUpperCase();
}

export function isValidClientId(str: string): boolean {
  return /^[0-9A-F]{16}$/.test(str);
}
