/**
 * Events Module
 * @module events
 */

export {
  EventBus,
  createEvent,
  type SyncState,
  type ReplicaEvent,
  type ReplicaEventMap,
  type ReplicaEventType,
  type EventHandler,
  type EventFilter,
  type EventBusOptions,
} from './event-bus.js';
