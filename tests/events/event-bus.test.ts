/**
 * EventBus Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, createEvent } from '../../src/events/event-bus.js';

function sent(count: number) {
  return createEvent('sync:sent', 'test', { groupId: 'group-1', count });
}

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  describe('publish/subscribe', () => {
    it('should publish events to subscribers', () => {
      const handler = vi.fn();
      bus.subscribe('sync:sent', handler);

      const event = sent(3);
      bus.publish(event);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(event);
    });

    it('should deliver every type to subscribeAll', () => {
      const handler = vi.fn();
      bus.subscribeAll(handler);

      bus.publish(sent(1));
      bus.publish(createEvent('sync:state_changed', 'test', { from: 'idle', to: 'sending' }));

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should return unsubscribe function', () => {
      const handler = vi.fn();
      const unsubscribe = bus.subscribe('sync:sent', handler);

      bus.publish(sent(1));
      unsubscribe();
      bus.publish(sent(2));

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should not deliver other types', () => {
      const handler = vi.fn();
      bus.subscribe('sync:received', handler);

      bus.publish(sent(1));

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('event history', () => {
    it('should limit history size', () => {
      const smallBus = new EventBus({ maxHistory: 5 });

      for (let i = 0; i < 10; i++) {
        smallBus.publish(sent(i));
      }

      const history = smallBus.getEvents({ types: ['sync:sent'] });
      expect(history.map((e) => e.payload)).toEqual([5, 6, 7, 8, 9].map((count) => ({ groupId: 'group-1', count })));
    });

    it('should keep nothing when history is disabled', () => {
      const quiet = new EventBus({ enableHistory: false });
      quiet.publish(sent(1));
      expect(quiet.getEvents()).toEqual([]);
    });

    it('should filter events by type', () => {
      bus.publish(sent(1));
      bus.publish(createEvent('ledger:committed', 'test', { records: 2, applied: 2 }));
      bus.publish(createEvent('sync:received', 'test', { groupId: 'group-1', count: 4 }));

      const filtered = bus.getEvents({ types: ['sync:sent', 'sync:received'] });
      expect(filtered.map((e) => e.type)).toEqual(['sync:sent', 'sync:received']);
    });

    it('should filter events by source', () => {
      bus.publish(createEvent('ledger:committed', 'module-a', { records: 1, applied: 1 }));
      bus.publish(createEvent('ledger:committed', 'module-b', { records: 1, applied: 1 }));

      expect(bus.getEvents({ source: 'module-a' })).toHaveLength(1);
    });

    it('should get recent events', () => {
      for (let i = 0; i < 10; i++) {
        bus.publish(sent(i));
      }

      const recent = bus.getRecentEvents(3);
      expect(recent.map((e) => e.payload)).toEqual([7, 8, 9].map((count) => ({ groupId: 'group-1', count })));
    });

    it('should clear history', () => {
      bus.publish(sent(1));
      bus.clearHistory();

      expect(bus.getEvents()).toHaveLength(0);
    });
  });

  describe('waitFor', () => {
    it('should wait for a specific event', async () => {
      const promise = bus.waitFor('sync:sent');

      setTimeout(() => {
        bus.publish(sent(7));
      }, 10);

      const event = await promise;
      expect(event.payload.count).toBe(7);
    });

    it('should timeout if event not received', async () => {
      const promise = bus.waitFor('sync:sent', { timeout: 50 });

      await expect(promise).rejects.toThrow('Timeout waiting for event');
    });

    it('should apply custom filter', async () => {
      const promise = bus.waitFor('sync:sent', {
        filter: (e) => e.payload.count === 2,
      });

      setTimeout(() => {
        bus.publish(sent(1));
        bus.publish(sent(2));
      }, 10);

      const event = await promise;
      expect(event.payload.count).toBe(2);
    });
  });

  describe('createEvent helper', () => {
    it('should create a properly formatted event', () => {
      const event = createEvent('bank:imported', 'test-source', {
        accountId: 'acct-1',
        created: 1,
        matched: 0,
        skipped: 0,
      });

      expect(event.type).toBe('bank:imported');
      expect(event.source).toBe('test-source');
      expect(event.payload).toEqual({ accountId: 'acct-1', created: 1, matched: 0, skipped: 0 });
      expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    });
  });
});
