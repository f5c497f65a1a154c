/**
 * Crypto Envelope Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ALGORITHM,
  KEY_LENGTH,
  decrypt,
  deriveKey,
  encrypt,
  makeKeyTest,
  makeSalt,
  unlockContext,
  verifyKeyTest,
  type EncryptionContext,
} from '../../src/crypto/envelope.js';
import { DecryptionError, KeyDerivationError } from '../../src/errors/index.js';

// keeps PBKDF2 fast in tests
const ITERATIONS = 1000;

describe('Crypto Envelope', () => {
  describe('makeSalt', () => {
    it('should return 32 random bytes as base64', () => {
      const salt = makeSalt();
      expect(Buffer.from(salt, 'base64')).toHaveLength(32);
      expect(makeSalt()).not.toBe(salt);
    });
  });

  describe('deriveKey', () => {
    it('should be deterministic for the same password and salt', async () => {
      const salt = makeSalt();
      const first = await deriveKey('test-secret', salt, ITERATIONS);
      const second = await deriveKey('test-secret', salt, ITERATIONS);

      expect(first).toHaveLength(KEY_LENGTH);
      expect(first.equals(second)).toBe(true);
    });

    it('should differ for a different salt or password', async () => {
      const salt = makeSalt();
      const base = await deriveKey('test-secret', salt, ITERATIONS);

      expect(base.equals(await deriveKey('test-secret', makeSalt(), ITERATIONS))).toBe(false);
      expect(base.equals(await deriveKey('other-secret', salt, ITERATIONS))).toBe(false);
    });

    it('should reject an empty password', async () => {
      await expect(deriveKey('', makeSalt(), ITERATIONS)).rejects.toBeInstanceOf(KeyDerivationError);
    });

    it('should reject an empty salt', async () => {
      await expect(deriveKey('test-secret', '', ITERATIONS)).rejects.toBeInstanceOf(KeyDerivationError);
    });
  });

  describe('encrypt / decrypt', () => {
    const plaintext = Buffer.from('ledger payload', 'utf8');

    it('should round-trip a payload', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);

      expect(sealed.meta.keyId).toBe('key-1');
      expect(sealed.meta.algorithm).toBe(ALGORITHM);
      expect(Buffer.from(sealed.meta.iv, 'base64')).toHaveLength(12);
      expect(Buffer.from(sealed.meta.authTag, 'base64')).toHaveLength(16);
      expect(sealed.value.equals(plaintext)).toBe(false);

      expect(decrypt(key, sealed.value, sealed.meta).toString('utf8')).toBe('ledger payload');
    });

    it('should use a fresh IV for every call', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const a = encrypt('key-1', key, plaintext);
      const b = encrypt('key-1', key, plaintext);
      expect(a.meta.iv).not.toBe(b.meta.iv);
    });

    it('should fail when a ciphertext byte is altered', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);

      for (const index of [0, 5, sealed.value.length - 1]) {
        const tampered = Buffer.from(sealed.value);
        tampered[index] ^= 0x01;
        expect(() => decrypt(key, tampered, sealed.meta)).toThrow(DecryptionError);
      }
    });

    it('should fail when the key id is altered', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);

      expect(() => decrypt(key, sealed.value, { ...sealed.meta, keyId: 'key-2' })).toThrow(DecryptionError);
    });

    it('should fail when the auth tag is altered', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);
      const tag = Buffer.from(sealed.meta.authTag, 'base64');
      tag[0] ^= 0x80;

      expect(() => decrypt(key, sealed.value, { ...sealed.meta, authTag: tag.toString('base64') })).toThrow(
        DecryptionError
      );
    });

    it('should fail under a different key', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const other = await deriveKey('other-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);

      expect(() => decrypt(other, sealed.value, sealed.meta)).toThrow(DecryptionError);
    });

    it('should reject an unknown algorithm', async () => {
      const key = await deriveKey('test-secret', makeSalt(), ITERATIONS);
      const sealed = encrypt('key-1', key, plaintext);

      expect(() => decrypt(key, sealed.value, { ...sealed.meta, algorithm: 'aes-128-cbc' })).toThrow(
        DecryptionError
      );
    });
  });

  describe('key tests', () => {
    async function context(password: string): Promise<EncryptionContext> {
      const salt = makeSalt();
      return { keyId: 'key-1', salt, masterKey: await deriveKey(password, salt, ITERATIONS) };
    }

    it('should verify only under the key that made it', async () => {
      const ctx = await context('test-secret');
      const test = makeKeyTest(ctx);
      const wrong = await deriveKey('other-secret', ctx.salt, ITERATIONS);

      expect(verifyKeyTest(ctx.masterKey, test)).toBe(true);
      expect(verifyKeyTest(wrong, test)).toBe(false);
    });

    it('should unlock with the right password', async () => {
      const ctx = await context('test-secret');
      const unlocked = await unlockContext(
        'test-secret',
        { keyId: ctx.keyId, salt: ctx.salt, test: makeKeyTest(ctx) },
        ITERATIONS
      );

      expect(unlocked.keyId).toBe('key-1');
      expect(unlocked.masterKey.equals(ctx.masterKey)).toBe(true);
    });

    it('should reject a wrong or empty password', async () => {
      const ctx = await context('test-secret');
      const key = { keyId: ctx.keyId, salt: ctx.salt, test: makeKeyTest(ctx) };

      await expect(unlockContext('other-secret', key, ITERATIONS)).rejects.toBeInstanceOf(KeyDerivationError);
      await expect(unlockContext('', key, ITERATIONS)).rejects.toBeInstanceOf(KeyDerivationError);
    });
  });
});
