/**
 * Change set assembly: ChangeRecords <-> (optionally encrypted) envelopes
 *
 * @module protocol/change-set
 */

import { Timestamp } from '../clock/hlc.js';
import { ALGORITHM, decrypt, encrypt, type EncryptionContext } from '../crypto/envelope.js';
import { DecryptionError, PayloadDecodeError } from '../errors/index.js';
import { createChangeRecord, type ChangeRecord } from '../sync/change-record.js';
import {
  decodeChangeSet,
  decodeEncryptedData,
  decodeMessage,
  encodeChangeSet,
  encodeEncryptedData,
  encodeMessage,
  type ChangeSet,
  type MessageEnvelope,
} from './codec.js';

export function sealRecord(record: ChangeRecord, encryption: EncryptionContext | null): MessageEnvelope {
  const plaintext = encodeMessage(record);
  const timestamp = record.timestamp.toString();

  if (!encryption) {
    return { timestamp, isEncrypted: false, content: plaintext };
  }

  const sealed = encrypt(encryption.keyId, encryption.masterKey, plaintext);
  return {
    timestamp,
    isEncrypted: true,
    content: encodeEncryptedData({
      iv: Buffer.from(sealed.meta.iv, 'base64'),
      authTag: Buffer.from(sealed.meta.authTag, 'base64'),
      data: sealed.value,
    }),
  };
}

/**
 * Encode records into one wire payload
 */
export function buildChangeSet(
  records: readonly ChangeRecord[],
  options: { clientId: string; groupId: string; encryption: EncryptionContext | null }
): Uint8Array {
  return encodeChangeSet({
    clientId: options.clientId,
    groupId: options.groupId,
    keyId: options.encryption?.keyId ?? null,
    messages: records.map((r) => sealRecord(r, options.encryption)),
  });
}

export function openEnvelope(
  envelope: MessageEnvelope,
  keyId: string | null,
  encryption: EncryptionContext | null
): ChangeRecord {
  const timestamp = Timestamp.parse(envelope.timestamp);
  if (!timestamp) {
    throw new PayloadDecodeError(`Malformed timestamp '${envelope.timestamp}'`);
  }

  let plaintext: Uint8Array;
  if (envelope.isEncrypted) {
    if (!encryption) {
      throw new DecryptionError('Received an encrypted message but the replica has no key', {
        timestamp: envelope.timestamp,
      });
    }
    const sealed = decodeEncryptedData(envelope.content);
    plaintext = decrypt(encryption.masterKey, sealed.data, {
      keyId: keyId ?? '',
      algorithm: ALGORITHM,
      iv: Buffer.from(sealed.iv).toString('base64'),
      authTag: Buffer.from(sealed.authTag).toString('base64'),
    });
  } else {
    if (encryption) {
      throw new DecryptionError('Received an unencrypted message on an encrypted replica', {
        timestamp: envelope.timestamp,
      });
    }
    plaintext = envelope.content;
  }

  return createChangeRecord(decodeMessage(plaintext), timestamp);
}

/**
 * Decode one wire payload fully; throws before returning anything if a single
 * envelope fails, so callers never see a partial batch. A change set sent by
 * `skipClientId` yields no records and its envelopes are left sealed.
 */
export function openChangeSet(
  payload: Uint8Array,
  encryption: EncryptionContext | null,
  options: { skipClientId?: string } = {}
): {
  changeSet: ChangeSet;
  records: ChangeRecord[];
} {
  const changeSet = decodeChangeSet(payload);
  if (options.skipClientId !== undefined && changeSet.clientId === options.skipClientId) {
    return { changeSet, records: [] };
  }
  const records = changeSet.messages.map((m) => openEnvelope(m, changeSet.keyId, encryption));
  return { changeSet, records };
}
