/**
 * Streaming Run Repository
 *
 * Handles database operations for in-flight response generations and the
 * permanent message each successful run finalizes into.
 */

import type { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type { RunStore } from '../record-store.js';
import { runQuery, type PgTransactional } from '../query.js';
import { StoreError } from '../../types/errors.js';
import {
  isActiveRun,
  mapStreamingRunRow,
  type StreamingRun,
  type StreamingRunKey,
  type StreamingRunRow,
} from '../../types/streaming.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'streaming-run-repository' });

export class StreamingRunRepository implements RunStore {
  constructor(private pool: PgTransactional) {}

  async create(run: StreamingRunKey): Promise<StreamingRun> {
    const result = await runQuery<StreamingRunRow>(this.pool, 'runs.create', `
      INSERT INTO streaming_runs (id, thread_id, room_id, responder_id, source_message_id, content, state)
      VALUES ($1, $2, $3, $4, $5, '', 'initializing')
      RETURNING *
    `, [run.id, run.threadId, run.roomId, run.responderId, run.sourceMessageId]);

    const row = result.rows[0];
    if (!row) {
      throw new StoreError('runs.create', `Failed to create run ${run.id}`);
    }
    return mapStreamingRunRow(row);
  }

  async findById(id: string): Promise<StreamingRun | null> {
    const result = await runQuery<StreamingRunRow>(this.pool, 'runs.findById', `
      SELECT * FROM streaming_runs WHERE id = $1
    `, [id]);

    return result.rows[0] ? mapStreamingRunRow(result.rows[0]) : null;
  }

  async retireActive(threadId: string, responderId: string, reason: string): Promise<string[]> {
    const result = await runQuery<{ id: string }>(this.pool, 'runs.retireActive', `
      UPDATE streaming_runs
      SET state = 'failed', failure_reason = $3, updated_at = NOW()
      WHERE thread_id = $1 AND responder_id = $2 AND state IN ('initializing', 'streaming')
      RETURNING id
    `, [threadId, responderId, reason]);

    return result.rows.map((row) => row.id);
  }

  /**
   * Upsert keyed by run id. The update branch is guarded so a late flush
   * can never reopen a terminal run.
   */
  async writeContent(run: StreamingRunKey, content: string): Promise<void> {
    await runQuery(this.pool, 'runs.writeContent', `
      INSERT INTO streaming_runs (id, thread_id, room_id, responder_id, source_message_id, content, state)
      VALUES ($1, $2, $3, $4, $5, $6, 'streaming')
      ON CONFLICT (id) DO UPDATE
        SET content = EXCLUDED.content, state = 'streaming', updated_at = NOW()
        WHERE streaming_runs.state IN ('initializing', 'streaming')
    `, [run.id, run.threadId, run.roomId, run.responderId, run.sourceMessageId, content]);
  }

  async complete(runId: string, content: string): Promise<string> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw StoreError.wrap('runs.complete', error);
    }

    try {
      await client.query('BEGIN');

      const locked = await client.query<StreamingRunRow>(`
        SELECT * FROM streaming_runs WHERE id = $1 FOR UPDATE
      `, [runId]);

      const row = locked.rows[0];
      if (!row) {
        throw new StoreError('runs.complete', `Run ${runId} not found`);
      }
      const run = mapStreamingRunRow(row);
      if (!isActiveRun(run)) {
        throw new StoreError('runs.complete', `Run ${runId} is already ${run.state}`);
      }

      const messageId = uuidv4();
      await client.query(`
        INSERT INTO messages (id, thread_id, content, sender_kind, sender_id, in_reply_to)
        VALUES ($1, $2, $3, 'responder', $4, $5)
      `, [messageId, run.threadId, content, run.responderId, run.sourceMessageId]);

      await client.query(`
        UPDATE streaming_runs
        SET content = $2, state = 'complete', final_record_id = $3, updated_at = NOW()
        WHERE id = $1
      `, [runId, content, messageId]);

      await client.query('COMMIT');
      return messageId;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error({ runId, error: rollbackError }, 'Rollback failed');
      }
      throw StoreError.wrap('runs.complete', error);
    } finally {
      client.release();
    }
  }

  async fail(runId: string, reason: string): Promise<boolean> {
    const result = await runQuery(this.pool, 'runs.fail', `
      UPDATE streaming_runs
      SET state = 'failed', failure_reason = $2, updated_at = NOW()
      WHERE id = $1 AND state IN ('initializing', 'streaming')
    `, [runId, reason]);

    return (result.rowCount ?? 0) > 0;
  }
}

/**
 * Factory function
 */
export function createStreamingRunRepository(pool: PgTransactional): StreamingRunRepository {
  return new StreamingRunRepository(pool);
}

export default StreamingRunRepository;
