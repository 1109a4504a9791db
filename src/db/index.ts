/**
 * PostgreSQL record store
 */

import type { Pool } from 'pg';
import type { RecordStore } from './record-store.js';
import { createThreadLockRepository } from './repositories/thread-lock-repository.js';
import { createStreamingRunRepository } from './repositories/streaming-run-repository.js';
import { createMessageRepository } from './repositories/message-repository.js';
import { createResponderRepository } from './repositories/responder-repository.js';
import { PgChangeFeed } from './pg-change-feed.js';

export function createPgRecordStore(pool: Pool): RecordStore {
  const changes = new PgChangeFeed(pool);

  return {
    locks: createThreadLockRepository(pool),
    runs: createStreamingRunRepository(pool),
    messages: createMessageRepository(pool),
    responders: createResponderRepository(pool),
    changes,
    async close() {
      await changes.close();
      await pool.end();
    },
  };
}

export type { RecordStore, LockStore, RunStore, MessageStore, ResponderStore, ChangeFeed } from './record-store.js';
