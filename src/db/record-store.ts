/**
 * Record Store
 *
 * The durable store the coordination core consumes. Every operation is
 * atomic at row granularity; conditional writes report whether they applied.
 * Two implementations exist: PostgreSQL (./index.ts) and in-process
 * (./memory/in-memory-record-store.ts).
 */

import type { NewThreadLock, ThreadLock, ThreadLockChanges } from '../types/locks.js';
import type { Message, StreamingRun, StreamingRunKey } from '../types/streaming.js';
import type { Responder } from '../types/responder.js';
import type { ChangeListener, Unsubscribe } from '../types/changes.js';

export interface LockStore {
  get(threadId: string): Promise<ThreadLock | null>;

  /**
   * Insert a lock when no row exists for the thread, or when the existing
   * row expired at or before `now`. Returns the stored lock, or null when a
   * live row is in the way.
   */
  insertIfAbsent(lock: NewThreadLock, now: Date): Promise<ThreadLock | null>;

  /**
   * Apply `changes` only while the row still carries `expectedVersion`.
   */
  compareAndUpdate(
    threadId: string,
    expectedVersion: number,
    changes: ThreadLockChanges
  ): Promise<ThreadLock | null>;

  /**
   * Delete the row only while it still carries `expectedVersion`.
   */
  compareAndDelete(threadId: string, expectedVersion: number): Promise<boolean>;
}

export interface RunStore {
  create(run: StreamingRunKey): Promise<StreamingRun>;

  findById(id: string): Promise<StreamingRun | null>;

  /**
   * Mark every initializing/streaming run for the pair as failed.
   * Returns the ids of the retired runs.
   */
  retireActive(threadId: string, responderId: string, reason: string): Promise<string[]>;

  /**
   * Create-or-update the run's content and move it to streaming.
   * Has no effect once the run is terminal.
   */
  writeContent(run: StreamingRunKey, content: string): Promise<void>;

  /**
   * In one transaction: insert the permanent message and mark the run
   * complete with `finalRecordId` pointing at it. Returns the message id.
   * Throws StoreError when the run is missing or already terminal.
   */
  complete(runId: string, content: string): Promise<string>;

  /**
   * Mark an active run failed. Returns false when it was already terminal.
   */
  fail(runId: string, reason: string): Promise<boolean>;
}

export interface MessageStore {
  findById(id: string): Promise<Message | null>;

  /** The most recent `limit` messages of the thread, oldest first */
  findRecent(threadId: string, limit: number): Promise<Message[]>;
}

export interface ResponderStore {
  findById(id: string): Promise<Responder | null>;

  /** Active responders registered to the room */
  findActiveByRoom(roomId: string): Promise<Responder[]>;
}

export interface ChangeFeed {
  subscribe(threadId: string, listener: ChangeListener): Unsubscribe;
}

export interface RecordStore {
  locks: LockStore;
  runs: RunStore;
  messages: MessageStore;
  responders: ResponderStore;
  changes: ChangeFeed;
  close(): Promise<void>;
}
