/**
 * Lock Coordinator Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LockCoordinator } from '../src/services/locks/lock-coordinator.js';
import { InMemoryRecordStore } from '../src/db/memory/in-memory-record-store.js';
import { StoreError } from '../src/types/errors.js';
import type { LockConfig } from '../src/config/coordination.js';
import type { LockStore } from '../src/db/record-store.js';
import type { ThreadLock } from '../src/types/locks.js';

const config: LockConfig = {
  producerTtlMs: 30_000,
  responderTtlMs: 120_000,
  refreshIntervalMs: 60_000,
};

const T0 = new Date('2024-06-01T12:00:00Z').getTime();

describe('LockCoordinator', () => {
  let clock: number;
  let store: InMemoryRecordStore;
  let locks: LockCoordinator;

  beforeEach(() => {
    clock = T0;
    store = new InMemoryRecordStore({ now: () => new Date(clock) });
    locks = new LockCoordinator({ store: store.locks, config, now: () => new Date(clock) });
  });

  describe('acquireProducer', () => {
    it('grants a producer lock on a free thread', async () => {
      const result = await locks.acquireProducer('T1', 'u1');

      expect(result.granted).toBe(true);
      if (result.granted) {
        expect(result.lock.holderId).toBe('u1');
        expect(result.lock.kind).toBe('producer');
        expect(result.lock.expiresAt.getTime()).toBe(T0 + 30_000);
      }
    });

    it('extends the window when the same producer asks again', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 10_000;

      const result = await locks.acquireProducer('T1', 'u1');

      expect(result.granted).toBe(true);
      if (result.granted) {
        expect(result.lock.expiresAt.getTime()).toBe(T0 + 40_000);
      }
    });

    it('reports a conflict with whole seconds until expiry', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 10_500;

      const result = await locks.acquireProducer('T1', 'u2');

      expect(result).toEqual({
        granted: false,
        holderId: 'u1',
        kind: 'producer',
        expiresAt: new Date(T0 + 30_000),
        retryAfterSeconds: 20,
      });
    });

    it('never reports less than one second to wait', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 29_900;

      const result = await locks.acquireProducer('T1', 'u2');

      expect(result.granted).toBe(false);
      if (!result.granted) {
        expect(result.retryAfterSeconds).toBe(1);
      }
    });

    it('treats an expired lock as absent without a release', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 30_000;

      const result = await locks.acquireProducer('T1', 'u2');

      expect(result.granted).toBe(true);
      if (result.granted) {
        expect(result.lock.holderId).toBe('u2');
      }
    });

    it('grants exactly one of many concurrent requests', async () => {
      const participants = ['u1', 'u2', 'u3', 'u4', 'u5'];

      const results = await Promise.all(participants.map((id) => locks.acquireProducer('T1', id)));

      expect(results.filter((result) => result.granted)).toHaveLength(1);
      expect(results.filter((result) => !result.granted)).toHaveLength(4);
    });
  });

  describe('transitionToResponder', () => {
    it('hands a producer lock to a responder and blocks other producers', async () => {
      expect((await locks.acquireProducer('T1', 'u1')).granted).toBe(true);

      const transition = await locks.transitionToResponder('T1', 'u1', 'botA');
      expect(transition.granted).toBe(true);
      if (transition.granted) {
        expect(transition.lock.kind).toBe('responder');
        expect(transition.lock.holderId).toBe('botA');
        expect(transition.lock.expiresAt.getTime()).toBe(T0 + 120_000);
      }

      const other = await locks.acquireProducer('T1', 'u2');
      expect(other.granted).toBe(false);
      if (!other.granted) {
        expect(other.holderId).toBe('botA');
        expect(other.kind).toBe('responder');
      }
    });

    it('creates a responder lock when none is live', async () => {
      const result = await locks.transitionToResponder('T1', 'u1', 'botA');

      expect(result.granted).toBe(true);
      if (result.granted) {
        expect(result.lock.kind).toBe('responder');
        expect(result.lock.holderId).toBe('botA');
      }
    });

    it('refuses when another participant produces', async () => {
      await locks.acquireProducer('T1', 'u1');

      const result = await locks.transitionToResponder('T1', 'u2', 'botA');

      expect(result.granted).toBe(false);
      if (!result.granted) {
        expect(result.holderId).toBe('u1');
      }
    });

    it('refuses while a responder holds the thread', async () => {
      await locks.transitionToResponder('T1', 'u1', 'botA');

      const result = await locks.transitionToResponder('T1', 'u1', 'botB');

      expect(result.granted).toBe(false);
      if (!result.granted) {
        expect(result.holderId).toBe('botA');
        expect(result.kind).toBe('responder');
      }
    });

    it('lets exactly one of two racing transitions through', async () => {
      const [a, b] = await Promise.all([
        locks.transitionToResponder('T1', 'u1', 'botA'),
        locks.transitionToResponder('T1', 'u1', 'botB'),
      ]);

      expect([a.granted, b.granted].filter(Boolean)).toHaveLength(1);
    });
  });

  describe('refresh', () => {
    it('extends a held lock by its kind TTL', async () => {
      await locks.transitionToResponder('T1', 'u1', 'botA');
      clock += 60_000;

      const result = await locks.refresh('T1', 'botA');

      expect(result.refreshed).toBe(true);
      if (result.refreshed) {
        expect(result.lock.expiresAt.getTime()).toBe(T0 + 180_000);
      }
    });

    it('accepts an explicit extension', async () => {
      await locks.acquireProducer('T1', 'u1');

      const result = await locks.refresh('T1', 'u1', 5_000);

      expect(result.refreshed).toBe(true);
      if (result.refreshed) {
        expect(result.lock.expiresAt.getTime()).toBe(T0 + 5_000);
      }
    });

    it('reports the current holder when the lock was taken over', async () => {
      await locks.transitionToResponder('T1', 'u1', 'botA');
      clock += 120_000;
      await locks.acquireProducer('T1', 'u2');

      const result = await locks.refresh('T1', 'botA');

      expect(result.refreshed).toBe(false);
      if (!result.refreshed) {
        expect(result.current?.holderId).toBe('u2');
      }
    });

    it('does not revive an expired lock', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 31_000;

      const result = await locks.refresh('T1', 'u1');

      expect(result).toEqual({ refreshed: false, current: null });
    });
  });

  describe('release', () => {
    it('is idempotent', async () => {
      await locks.acquireProducer('T1', 'u1');

      await locks.release('T1', 'u1');
      await locks.release('T1', 'u1');

      expect(await locks.inspect('T1')).toBeNull();
    });

    it('never touches a lock held by someone else', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 31_000;
      await locks.acquireProducer('T1', 'u2');

      await locks.release('T1', 'u1');

      const lock = await locks.inspect('T1');
      expect(lock?.holderId).toBe('u2');
    });

    it('clears its own expired row', async () => {
      await locks.acquireProducer('T1', 'u1');
      clock += 31_000;

      await locks.release('T1', 'u1');

      expect(await store.locks.get('T1')).toBeNull();
    });
  });

  describe('inspect', () => {
    it('hides expired locks', async () => {
      await locks.acquireProducer('T1', 'u1');
      expect(await locks.inspect('T1')).not.toBeNull();

      clock += 30_000;
      expect(await locks.inspect('T1')).toBeNull();
    });
  });

  describe('contention budget', () => {
    it('throws a StoreError when every conditional write loses', async () => {
      const held: ThreadLock = {
        threadId: 'T1',
        holderId: 'u1',
        kind: 'producer',
        acquiredAt: new Date(T0),
        expiresAt: new Date(T0 + 30_000),
        version: 1,
      };
      const flaky: LockStore = {
        get: vi.fn().mockResolvedValue(held),
        insertIfAbsent: vi.fn().mockResolvedValue(null),
        compareAndUpdate: vi.fn().mockResolvedValue(null),
        compareAndDelete: vi.fn().mockResolvedValue(false),
      };
      const contended = new LockCoordinator({ store: flaky, config, now: () => new Date(clock) });

      await expect(contended.acquireProducer('T1', 'u1')).rejects.toBeInstanceOf(StoreError);
      await expect(contended.release('T1', 'u1')).rejects.toBeInstanceOf(StoreError);
      expect(flaky.compareAndUpdate).toHaveBeenCalledTimes(5);
      expect(flaky.compareAndDelete).toHaveBeenCalledTimes(5);
    });
  });
});
