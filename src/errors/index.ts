/**
 * Replica error taxonomy
 *
 * Every failure the engine raises is a ReplicaError with a stable `code`,
 * so callers can branch on it without instanceof checks across bundles.
 *
 * @module errors
 */

export type ReplicaErrorCode =
  | 'KEY_DERIVATION'
  | 'DECRYPTION'
  | 'UNSUPPORTED_SCHEMA'
  | 'INVALID_VALUE'
  | 'TRANSPORT'
  | 'PAYLOAD_DECODE'
  | 'CLOCK_OVERFLOW'
  | 'SYNC_STATE'
  | 'SYNC_ABORTED'
  | 'EDIT_SESSION'
  | 'NOT_FOUND'
  | 'BANK_SYNC'
  | 'INTERNAL';

export class ReplicaError extends Error {
  readonly code: ReplicaErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ReplicaErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Bad or missing password for an encrypted replica */
export class KeyDerivationError extends ReplicaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('KEY_DERIVATION', message, details);
  }
}

/** AEAD tag did not verify: corrupted payload, wrong key or wrong key id */
export class DecryptionError extends ReplicaError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('DECRYPTION', message, details, { cause });
  }
}

export class UnsupportedSchemaError extends ReplicaError {
  readonly dataset: string;
  readonly column: string | null;

  constructor(dataset: string, column: string | null = null) {
    super(
      'UNSUPPORTED_SCHEMA',
      column === null
        ? `Unsupported dataset '${dataset}'`
        : `Unsupported column '${column}' on dataset '${dataset}'`,
      { dataset, column }
    );
    this.dataset = dataset;
    this.column = column;
  }
}

/** Value whose type does not fit its declared column */
export class InvalidValueError extends ReplicaError {
  constructor(dataset: string, column: string, expected: string, value: unknown) {
    super('INVALID_VALUE', `Column '${dataset}.${column}' expects ${expected}, got ${typeof value}`, {
      dataset,
      column,
      expected,
    });
  }
}

/** Relay failure, reported as-is; retrying is the caller's decision */
export class TransportError extends ReplicaError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super('TRANSPORT', message, details, { cause });
  }
}

export class PayloadDecodeError extends ReplicaError {
  constructor(message: string, cause?: unknown) {
    super('PAYLOAD_DECODE', message, undefined, { cause });
  }
}

export class ClockOverflowError extends ReplicaError {
  constructor(millis: number) {
    super('CLOCK_OVERFLOW', 'Logical clock counter overflow', { millis });
  }
}

export class SyncStateError extends ReplicaError {
  constructor(message: string, state: string) {
    super('SYNC_STATE', message, { state });
  }
}

export class SyncAbortedError extends ReplicaError {
  constructor(phase: string) {
    super('SYNC_ABORTED', `Sync round aborted during ${phase}`, { phase });
  }
}

export class EditSessionError extends ReplicaError {
  constructor(message: string) {
    super('EDIT_SESSION', message);
  }
}

export class NotFoundError extends ReplicaError {
  constructor(kind: string, id: string) {
    super('NOT_FOUND', `${kind} '${id}' not found`, { kind, id });
  }
}

/** Failure reported by a bank-feed provider */
export class BankSyncError extends ReplicaError {
  readonly errorType: string;
  readonly status: string;
  readonly reason: string;

  constructor(errorType: string, status: string, reason: string) {
    super('BANK_SYNC', `Bank sync failed (${errorType}): ${reason}`, {
      errorType,
      status,
      reason,
    });
    this.errorType = errorType;
    this.status = status;
    this.reason = reason;
  }
}

export function isReplicaError(err: unknown): err is ReplicaError {
  return err instanceof ReplicaError;
}

/**
 * Normalise anything thrown into a ReplicaError
 */
export function toReplicaError(err: unknown): ReplicaError {
  if (err instanceof ReplicaError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ReplicaError('INTERNAL', message, undefined, { cause: err });
}
