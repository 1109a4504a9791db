/**
 * Thread lock types
 *
 * A thread lock serializes access to one conversation thread. Producers are
 * humans composing a message; responders are automated participants
 * generating a reply.
 */

export type LockKind = 'producer' | 'responder';

export interface ThreadLock {
  threadId: string;
  /** Participant (human or responder) currently holding the lock */
  holderId: string;
  kind: LockKind;
  acquiredAt: Date;
  /** The lock is logically absent once this instant has passed */
  expiresAt: Date;
  /** Incremented on every write; the compare-and-swap token */
  version: number;
}

/**
 * Database row for thread_locks
 */
export interface ThreadLockRow {
  thread_id: string;
  holder_id: string;
  kind: LockKind;
  acquired_at: Date;
  expires_at: Date;
  version: number;
}

export type NewThreadLock = Omit<ThreadLock, 'version'>;

export type ThreadLockChanges = Partial<Pick<ThreadLock, 'holderId' | 'kind' | 'acquiredAt' | 'expiresAt'>>;

export interface LockGrant {
  granted: true;
  lock: ThreadLock;
}

export interface LockConflict {
  granted: false;
  holderId: string;
  kind: LockKind;
  expiresAt: Date;
  /** Whole seconds until the conflicting lock lapses, never below 1 */
  retryAfterSeconds: number;
}

export type LockResult = LockGrant | LockConflict;

export type RefreshResult =
  | { refreshed: true; lock: ThreadLock }
  | { refreshed: false; current: ThreadLock | null };

export function mapThreadLockRow(row: ThreadLockRow): ThreadLock {
  return {
    threadId: row.thread_id,
    holderId: row.holder_id,
    kind: row.kind,
    acquiredAt: new Date(row.acquired_at),
    expiresAt: new Date(row.expires_at),
    version: Number(row.version),
  };
}

/**
 * A lock whose deadline has passed is treated as absent by every operation.
 */
export function isLive(lock: ThreadLock | null, now: Date): lock is ThreadLock {
  return lock !== null && lock.expiresAt.getTime() > now.getTime();
}
