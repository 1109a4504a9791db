/**
 * Thread Lock Repository
 *
 * Conditional reads and writes against thread_locks. Each method is a
 * single statement, so every write is atomic at row granularity; callers
 * compose them into compare-and-swap loops.
 */

import type { LockStore } from '../record-store.js';
import { runQuery, type PgQueryable } from '../query.js';
import {
  mapThreadLockRow,
  type NewThreadLock,
  type ThreadLock,
  type ThreadLockChanges,
  type ThreadLockRow,
} from '../../types/locks.js';

export class ThreadLockRepository implements LockStore {
  constructor(private pool: PgQueryable) {}

  async get(threadId: string): Promise<ThreadLock | null> {
    const result = await runQuery<ThreadLockRow>(this.pool, 'locks.get', `
      SELECT * FROM thread_locks WHERE thread_id = $1
    `, [threadId]);

    return result.rows[0] ? mapThreadLockRow(result.rows[0]) : null;
  }

  /**
   * Insert, or take over a row that expired at or before `now`.
   * The conflict branch only fires under the expiry guard, so a live row
   * is never overwritten.
   */
  async insertIfAbsent(lock: NewThreadLock, now: Date): Promise<ThreadLock | null> {
    const result = await runQuery<ThreadLockRow>(this.pool, 'locks.insertIfAbsent', `
      INSERT INTO thread_locks (thread_id, holder_id, kind, acquired_at, expires_at, version)
      VALUES ($1, $2, $3, $4, $5, 1)
      ON CONFLICT (thread_id) DO UPDATE
        SET holder_id = EXCLUDED.holder_id,
            kind = EXCLUDED.kind,
            acquired_at = EXCLUDED.acquired_at,
            expires_at = EXCLUDED.expires_at,
            version = thread_locks.version + 1
        WHERE thread_locks.expires_at <= $6
      RETURNING *
    `, [lock.threadId, lock.holderId, lock.kind, lock.acquiredAt, lock.expiresAt, now]);

    return result.rows[0] ? mapThreadLockRow(result.rows[0]) : null;
  }

  async compareAndUpdate(
    threadId: string,
    expectedVersion: number,
    changes: ThreadLockChanges
  ): Promise<ThreadLock | null> {
    const result = await runQuery<ThreadLockRow>(this.pool, 'locks.compareAndUpdate', `
      UPDATE thread_locks
      SET holder_id = COALESCE($3, holder_id),
          kind = COALESCE($4, kind),
          acquired_at = COALESCE($5, acquired_at),
          expires_at = COALESCE($6, expires_at),
          version = version + 1
      WHERE thread_id = $1 AND version = $2
      RETURNING *
    `, [
      threadId,
      expectedVersion,
      changes.holderId ?? null,
      changes.kind ?? null,
      changes.acquiredAt ?? null,
      changes.expiresAt ?? null,
    ]);

    return result.rows[0] ? mapThreadLockRow(result.rows[0]) : null;
  }

  async compareAndDelete(threadId: string, expectedVersion: number): Promise<boolean> {
    const result = await runQuery(this.pool, 'locks.compareAndDelete', `
      DELETE FROM thread_locks WHERE thread_id = $1 AND version = $2
    `, [threadId, expectedVersion]);

    return (result.rowCount ?? 0) > 0;
  }
}

/**
 * Factory function
 */
export function createThreadLockRepository(pool: PgQueryable): ThreadLockRepository {
  return new ThreadLockRepository(pool);
}

export default ThreadLockRepository;
