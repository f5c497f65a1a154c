/**
 * Ledger Replica
 * Client-side replica of a multi-device, eventually consistent ledger
 *
 * @module ledger-replica
 * @version 1.0.0
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Clock
export * from './clock/hlc.js';
export * from './clock/replica-clock.js';

// Crypto
export * from './crypto/envelope.js';

// Wire format
export * from './protocol/codec.js';
export * from './protocol/change-set.js';

// Storage
export * from './storage/index.js';

// Sync
export * from './sync/index.js';

// Events
export * from './events/index.js';

// Replica
export * from './replica/index.js';

// Bank import
export * from './bank/index.js';

// Utilities
export * from './utils/index.js';
