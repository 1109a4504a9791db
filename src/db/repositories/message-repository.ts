/**
 * Message Repository
 *
 * Read access to permanent thread messages. Responder messages are written
 * by StreamingRunRepository.complete; human messages by the chat surface.
 */

import type { MessageStore } from '../record-store.js';
import { runQuery, type PgQueryable } from '../query.js';
import { mapMessageRow, type Message, type MessageRow } from '../../types/streaming.js';

export class MessageRepository implements MessageStore {
  constructor(private pool: PgQueryable) {}

  async findById(id: string): Promise<Message | null> {
    const result = await runQuery<MessageRow>(this.pool, 'messages.findById', `
      SELECT * FROM messages WHERE id = $1
    `, [id]);

    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  /**
   * Get recent messages (for context)
   */
  async findRecent(threadId: string, limit: number = 10): Promise<Message[]> {
    const result = await runQuery<MessageRow>(this.pool, 'messages.findRecent', `
      SELECT * FROM messages
      WHERE thread_id = $1
      ORDER BY created_at DESC
      LIMIT $2
    `, [threadId, limit]);

    return result.rows.map((row) => mapMessageRow(row)).reverse();
  }
}

export function createMessageRepository(pool: PgQueryable): MessageRepository {
  return new MessageRepository(pool);
}

export default MessageRepository;
