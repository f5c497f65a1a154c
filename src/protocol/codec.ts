/**
 * Wire codec - Protocol Buffers encoding of change sets
 *
 * The schema is parsed once at load time by protobufjs. Values are a tagged
 * oneof so null, booleans, integers, doubles and strings survive a round trip
 * with their kind intact.
 *
 * @module protocol/codec
 */

import protobuf from 'protobufjs';
import type { Variant } from '../types/index.js';
import type { ChangeInput } from '../sync/change-record.js';
import { PayloadDecodeError } from '../errors/index.js';

const SYNC_PROTO = `
syntax = "proto3";
package ledger.sync;

message Value {
  oneof kind {
    bool null_value = 1;
    bool bool_value = 2;
    sint64 int_value = 3;
    double float_value = 4;
    string string_value = 5;
  }
}

message Message {
  string dataset = 1;
  string row = 2;
  string column = 3;
  Value value = 4;
}

message EncryptedData {
  bytes iv = 1;
  bytes auth_tag = 2;
  bytes data = 3;
}

message MessageEnvelope {
  string timestamp = 1;
  bool is_encrypted = 2;
  bytes content = 3;
}

message ChangeSet {
  string client_id = 1;
  string group_id = 2;
  string key_id = 3;
  repeated MessageEnvelope messages = 4;
}
`;

const root = protobuf.parse(SYNC_PROTO, { keepCase: true }).root;
const MessageType = root.lookupType('ledger.sync.Message');
const EncryptedDataType = root.lookupType('ledger.sync.EncryptedData');
const ChangeSetType = root.lookupType('ledger.sync.ChangeSet');

const TO_OBJECT: protobuf.IConversionOptions = { longs: Number, oneofs: true, defaults: true, arrays: true };

export interface MessageEnvelope {
  /** Serialized logical timestamp, readable without decrypting */
  timestamp: string;
  isEncrypted: boolean;
  content: Uint8Array;
}

export interface ChangeSet {
  clientId: string;
  groupId: string;
  /** Null for plaintext change sets */
  keyId: string | null;
  messages: MessageEnvelope[];
}

export interface EncryptedData {
  iv: Uint8Array;
  authTag: Uint8Array;
  data: Uint8Array;
}

type Plain = Record<string, unknown>;

function isPlain(value: unknown): value is Plain {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(obj: Plain, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new PayloadDecodeError(`Field '${key}' is not a string`);
  return value;
}

function bytes(obj: Plain, key: string): Uint8Array {
  const value = obj[key];
  if (!(value instanceof Uint8Array)) throw new PayloadDecodeError(`Field '${key}' is not bytes`);
  return value;
}

function decodeWith<T>(type: protobuf.Type, data: Uint8Array, read: (obj: Plain) => T): T {
  let obj: unknown;
  try {
    obj = type.toObject(type.decode(data), TO_OBJECT);
  } catch (err) {
    throw new PayloadDecodeError(`Malformed ${type.name} payload`, err);
  }
  if (!isPlain(obj)) throw new PayloadDecodeError(`Malformed ${type.name} payload`);
  return read(obj);
}

function encodeValue(value: Variant): Plain {
  if (value === null) return { null_value: true };
  if (typeof value === 'boolean') return { bool_value: value };
  if (typeof value === 'string') return { string_value: value };
  if (Number.isSafeInteger(value) && !Object.is(value, -0)) return { int_value: value };
  return { float_value: value };
}

function decodeValue(obj: unknown): Variant {
  if (!isPlain(obj)) throw new PayloadDecodeError('Message has no value');
  const kind = obj.kind;
  const value = typeof kind === 'string' ? obj[kind] : undefined;

  switch (kind) {
    case 'null_value':
      return null;
    case 'bool_value':
      if (typeof value === 'boolean') return value;
      break;
    case 'int_value':
    case 'float_value':
      if (typeof value === 'number') return value;
      break;
    case 'string_value':
      if (typeof value === 'string') return value;
      break;
    default:
      throw new PayloadDecodeError('Message value kind is missing');
  }
  throw new PayloadDecodeError(`Value '${kind}' has the wrong type`);
}

export function encodeMessage(input: ChangeInput): Uint8Array {
  return MessageType.encode(
    MessageType.fromObject({
      dataset: input.dataset,
      row: input.row,
      column: input.column,
      value: encodeValue(input.value),
    })
  ).finish();
}

export function decodeMessage(data: Uint8Array): ChangeInput {
  return decodeWith(MessageType, data, (obj) => ({
    dataset: str(obj, 'dataset'),
    row: str(obj, 'row'),
    column: str(obj, 'column'),
    value: decodeValue(obj.value),
  }));
}

export function encodeEncryptedData(sealed: EncryptedData): Uint8Array {
  return EncryptedDataType.encode(
    EncryptedDataType.fromObject({ iv: sealed.iv, auth_tag: sealed.authTag, data: sealed.data })
  ).finish();
}

export function decodeEncryptedData(data: Uint8Array): EncryptedData {
  return decodeWith(EncryptedDataType, data, (obj) => ({
    iv: bytes(obj, 'iv'),
    authTag: bytes(obj, 'auth_tag'),
    data: bytes(obj, 'data'),
  }));
}

export function encodeChangeSet(changeSet: ChangeSet): Uint8Array {
  return ChangeSetType.encode(
    ChangeSetType.fromObject({
      client_id: changeSet.clientId,
      group_id: changeSet.groupId,
      key_id: changeSet.keyId ?? '',
      messages: changeSet.messages.map((m) => ({
        timestamp: m.timestamp,
        is_encrypted: m.isEncrypted,
        content: m.content,
      })),
    })
  ).finish();
}

export function decodeChangeSet(data: Uint8Array): ChangeSet {
  return decodeWith(ChangeSetType, data, (obj) => {
    const messages = obj.messages;
    if (!Array.isArray(messages)) throw new PayloadDecodeError('Change set has no message list');
    const keyId = str(obj, 'key_id');

    return {
      clientId: str(obj, 'client_id'),
      groupId: str(obj, 'group_id'),
      keyId: keyId === '' ? null : keyId,
      messages: messages.map((m: unknown): MessageEnvelope => {
        if (!isPlain(m)) throw new PayloadDecodeError('Malformed message envelope');
        const isEncrypted = m.is_encrypted;
        if (typeof isEncrypted !== 'boolean') throw new PayloadDecodeError("Field 'is_encrypted' is not a boolean");
        return { timestamp: str(m, 'timestamp'), isEncrypted, content: bytes(m, 'content') };
      }),
    };
  });
}
