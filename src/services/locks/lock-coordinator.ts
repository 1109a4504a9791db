/**
 * Lock Coordinator
 *
 * Policy layer over the lock store. Every operation reads the row, decides,
 * and writes back with a version guard; losing a race means re-reading and
 * deciding again. Expiry is always judged against the clock at decision
 * time, never against an earlier read.
 */

import type { LockStore } from '../../db/record-store.js';
import type { LockConfig } from '../../config/coordination.js';
import { StoreError } from '../../types/errors.js';
import {
  isLive,
  type LockConflict,
  type LockKind,
  type LockResult,
  type NewThreadLock,
  type RefreshResult,
  type ThreadLock,
} from '../../types/locks.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'lock-coordinator' });

/** Compare-and-swap rounds before giving up on a contended row */
const MAX_ATTEMPTS = 5;

export interface LockCoordinatorOptions {
  store: LockStore;
  config: LockConfig;
  now?: () => Date;
}

/**
 * What a single round decided: a final answer, or "the row moved, go again"
 */
type Round<T> = { done: true; value: T } | { done: false };

const retry = { done: false } as const;

function done<T>(value: T): Round<T> {
  return { done: true, value };
}

export class LockCoordinator {
  private store: LockStore;
  private config: LockConfig;
  private now: () => Date;

  constructor(options: LockCoordinatorOptions) {
    this.store = options.store;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Grant a producer lock to a human composing a message.
   * Re-granting to the current producer extends its window.
   */
  async acquireProducer(threadId: string, participantId: string): Promise<LockResult> {
    return this.withRetries<LockResult>('acquireProducer', threadId, async (current, now) => {
      if (!current) {
        return this.tryInsert(this.newLock(threadId, participantId, 'producer', now), now);
      }

      if (current.kind === 'producer' && current.holderId === participantId) {
        const updated = await this.store.compareAndUpdate(threadId, current.version, {
          expiresAt: this.deadline('producer', now),
        });
        return updated ? done(granted(updated)) : retry;
      }

      return done<LockResult>(conflict(current, now));
    });
  }

  /**
   * Hand the thread from a human producer to a responder about to run.
   * With no live lock at all a fresh responder lock is created, since the
   * producer step is best-effort on the client side.
   */
  async transitionToResponder(
    threadId: string,
    requestingParticipantId: string,
    responderId: string
  ): Promise<LockResult> {
    return this.withRetries<LockResult>('transitionToResponder', threadId, async (current, now) => {
      if (!current) {
        return this.tryInsert(this.newLock(threadId, responderId, 'responder', now), now);
      }

      if (current.kind === 'responder' || current.holderId !== requestingParticipantId) {
        return done<LockResult>(conflict(current, now));
      }

      const updated = await this.store.compareAndUpdate(threadId, current.version, {
        kind: 'responder',
        holderId: responderId,
        acquiredAt: now,
        expiresAt: this.deadline('responder', now),
      });
      return updated ? done(granted(updated)) : retry;
    });
  }

  /**
   * Push back the deadline of a lock the caller still holds.
   * `extensionMs` defaults to the TTL for the lock's kind.
   */
  async refresh(threadId: string, holderId: string, extensionMs?: number): Promise<RefreshResult> {
    return this.withRetries<RefreshResult>('refresh', threadId, async (current, now) => {
      if (!current || current.holderId !== holderId) {
        return done<RefreshResult>({ refreshed: false, current });
      }

      const extension = extensionMs ?? this.ttl(current.kind);
      const updated = await this.store.compareAndUpdate(threadId, current.version, {
        expiresAt: new Date(now.getTime() + extension),
      });
      return updated ? done<RefreshResult>({ refreshed: true, lock: updated }) : retry;
    });
  }

  /**
   * Release a lock held by `holderId`. Absent, expired-and-taken-over or
   * foreign locks are left alone; releasing twice is a no-op.
   */
  async release(threadId: string, holderId: string): Promise<void> {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      // Read the raw row: an expired row of our own is still ours to clear
      const row = await this.store.get(threadId);
      if (!row || row.holderId !== holderId) {
        return;
      }

      if (await this.store.compareAndDelete(threadId, row.version)) {
        logger.debug({ threadId, holderId, kind: row.kind }, 'Lock released');
        return;
      }
    }

    throw new StoreError('locks.release', `Lock for thread ${threadId} kept changing under release`);
  }

  /**
   * The live lock on a thread, or null
   */
  async inspect(threadId: string): Promise<ThreadLock | null> {
    const row = await this.store.get(threadId);
    return isLive(row, this.now()) ? row : null;
  }

  ttl(kind: LockKind): number {
    return kind === 'producer' ? this.config.producerTtlMs : this.config.responderTtlMs;
  }

  private deadline(kind: LockKind, now: Date): Date {
    return new Date(now.getTime() + this.ttl(kind));
  }

  private newLock(threadId: string, holderId: string, kind: LockKind, now: Date): NewThreadLock {
    return { threadId, holderId, kind, acquiredAt: now, expiresAt: this.deadline(kind, now) };
  }

  private async tryInsert(lock: NewThreadLock, now: Date): Promise<Round<LockResult>> {
    const inserted = await this.store.insertIfAbsent(lock, now);
    return inserted ? done(granted(inserted)) : retry;
  }

  /**
   * Run `decide` against a fresh read until it settles. The live lock (or
   * null once expired) and the decision instant are passed in.
   */
  private async withRetries<T>(
    operation: string,
    threadId: string,
    decide: (current: ThreadLock | null, now: Date) => Promise<Round<T>>
  ): Promise<T> {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const row = await this.store.get(threadId);
      const now = this.now();
      const round = await decide(isLive(row, now) ? row : null, now);

      if (round.done) {
        logger.debug({ operation, threadId, attempt }, 'Lock operation settled');
        return round.value;
      }
    }

    logger.warn({ operation, threadId }, 'Lock operation did not settle');
    throw new StoreError(`locks.${operation}`, `Lock for thread ${threadId} kept changing`);
  }
}

function granted(lock: ThreadLock): LockResult {
  return { granted: true, lock };
}

function conflict(current: ThreadLock, now: Date): LockConflict {
  const remainingMs = current.expiresAt.getTime() - now.getTime();
  return {
    granted: false,
    holderId: current.holderId,
    kind: current.kind,
    expiresAt: current.expiresAt,
    retryAfterSeconds: Math.max(1, Math.ceil(remainingMs / 1000)),
  };
}
