/**
 * Crypto Envelope - password-derived keys and AEAD for change payloads
 *
 * Keys come from PBKDF2-HMAC-SHA512 over (password, salt). Payloads are sealed
 * with AES-256-GCM; the key id is bound as associated data, so a ciphertext
 * presented under another key identity fails authentication.
 *
 * @module crypto/envelope
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from 'node:crypto';
import { promisify } from 'node:util';
import { DecryptionError, KeyDerivationError } from '../errors/index.js';

const pbkdf2Async = promisify(pbkdf2);

export const ALGORITHM = 'aes-256-gcm';
export const KEY_LENGTH = 32;
export const IV_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;
export const SALT_LENGTH = 32;
export const DEFAULT_KDF_ITERATIONS = 10_000;

export interface EncryptionMeta {
  keyId: string;
  algorithm: string;
  /** base64 */
  iv: string;
  /** base64 */
  authTag: string;
}

export interface EncryptedPayload {
  value: Buffer;
  meta: EncryptionMeta;
}

/**
 * Key material for an encrypted replica. `masterKey` lives only in memory.
 */
export interface EncryptionContext {
  keyId: string;
  masterKey: Buffer;
  /** base64 */
  salt: string;
}

/** New random salt, base64 encoded */
export function makeSalt(): string {
  return randomBytes(SALT_LENGTH).toString('base64');
}

/**
 * Derive the master key. Deterministic for the same (password, salt).
 *
 * @throws {KeyDerivationError} on an empty password or unusable salt
 */
export async function deriveKey(
  password: string,
  salt: string,
  iterations: number = DEFAULT_KDF_ITERATIONS
): Promise<Buffer> {
  if (password.length === 0) {
    throw new KeyDerivationError('Encryption password must not be empty');
  }
  const saltBytes = Buffer.from(salt, 'base64');
  if (saltBytes.length === 0) {
    throw new KeyDerivationError('Encryption salt is empty');
  }
  return pbkdf2Async(password.normalize('NFKC'), saltBytes, iterations, KEY_LENGTH, 'sha512');
}

export function encrypt(keyId: string, masterKey: Uint8Array, plaintext: Uint8Array): EncryptedPayload {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, masterKey, iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(Buffer.from(keyId, 'utf8'));
  const value = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return {
    value,
    meta: {
      keyId,
      algorithm: ALGORITHM,
      iv: iv.toString('base64'),
      authTag: cipher.getAuthTag().toString('base64'),
    },
  };
}

/**
 * Open a sealed payload.
 *
 * @throws {DecryptionError} when the tag does not verify; never returns
 * unauthenticated bytes
 */
export function decrypt(masterKey: Uint8Array, ciphertext: Uint8Array, meta: EncryptionMeta): Buffer {
  if (meta.algorithm !== ALGORITHM) {
    throw new DecryptionError(`Unsupported algorithm '${meta.algorithm}'`, { keyId: meta.keyId });
  }
  const iv = Buffer.from(meta.iv, 'base64');
  const authTag = Buffer.from(meta.authTag, 'base64');
  if (masterKey.length !== KEY_LENGTH || iv.length !== IV_LENGTH || authTag.length !== AUTH_TAG_LENGTH) {
    throw new DecryptionError('Malformed encryption parameters', { keyId: meta.keyId });
  }

  try {
    const decipher = createDecipheriv(ALGORITHM, masterKey, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAAD(Buffer.from(meta.keyId, 'utf8'));
    decipher.setAuthTag(authTag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new DecryptionError('Payload failed authentication', { keyId: meta.keyId }, err);
  }
}

/**
 * Known plaintext sealed under a new key; the registry keeps it so a later
 * unlock can check a password without the password leaving the replica.
 */
export interface KeyTest {
  value: string;
  meta: EncryptionMeta;
}

export function makeKeyTest(context: EncryptionContext): KeyTest {
  const sealed = encrypt(context.keyId, context.masterKey, randomBytes(16));
  return { value: sealed.value.toString('base64'), meta: sealed.meta };
}

export function verifyKeyTest(masterKey: Uint8Array, test: KeyTest): boolean {
  try {
    decrypt(masterKey, Buffer.from(test.value, 'base64'), test.meta);
    return true;
  } catch (err) {
    if (err instanceof DecryptionError) return false;
    throw err;
  }
}

/**
 * Derive and verify a context in one step.
 *
 * @throws {KeyDerivationError} when the password does not open `test`
 */
export async function unlockContext(
  password: string,
  key: { keyId: string; salt: string; test: KeyTest },
  iterations?: number
): Promise<EncryptionContext> {
  const masterKey = await deriveKey(password, key.salt, iterations);
  if (!verifyKeyTest(masterKey, key.test)) {
    throw new KeyDerivationError('Encryption password is incorrect', { keyId: key.keyId });
  }
  return { keyId: key.keyId, masterKey, salt: key.salt };
}
