/**
 * Responder Repository
 */

import type { ResponderStore } from '../record-store.js';
import { runQuery, type PgQueryable } from '../query.js';
import { mapResponderRow, type Responder, type ResponderRow } from '../../types/responder.js';

export class ResponderRepository implements ResponderStore {
  constructor(private pool: PgQueryable) {}

  async findById(id: string): Promise<Responder | null> {
    const result = await runQuery<ResponderRow>(this.pool, 'responders.findById', `
      SELECT id, name, instructions, description, personality, model, is_moderator, selection_format
      FROM responders
      WHERE id = $1
    `, [id]);

    return result.rows[0] ? mapResponderRow(result.rows[0]) : null;
  }

  async findActiveByRoom(roomId: string): Promise<Responder[]> {
    const result = await runQuery<ResponderRow>(this.pool, 'responders.findActiveByRoom', `
      SELECT r.id, r.name, r.instructions, r.description, r.personality, r.model,
             r.is_moderator, r.selection_format
      FROM room_responders rr
      JOIN responders r ON r.id = rr.responder_id
      WHERE rr.room_id = $1 AND rr.is_active = true AND r.is_active = true
      ORDER BY r.name ASC
    `, [roomId]);

    return result.rows.map((row) => mapResponderRow(row));
  }
}

export function createResponderRepository(pool: PgQueryable): ResponderRepository {
  return new ResponderRepository(pool);
}

export default ResponderRepository;
