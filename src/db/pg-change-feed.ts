/**
 * PostgreSQL change feed
 *
 * Holds one dedicated connection LISTENing on the thread_changes channel
 * (see migrations/004_change_notifications.sql) and fans notifications out
 * to per-thread subscribers. The connection is opened on first subscribe.
 */

import { EventEmitter } from 'events';
import type { Notification, Pool, PoolClient } from 'pg';
import { z } from 'zod';
import type { ChangeFeed } from './record-store.js';
import type { ChangeListener, RecordChange, Unsubscribe } from '../types/changes.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ module: 'pg-change-feed' });

export const CHANGE_CHANNEL = 'thread_changes';

const RecordChangeSchema = z.object({
  table: z.enum(['thread_locks', 'streaming_runs', 'messages']),
  op: z.enum(['insert', 'update', 'delete']),
  threadId: z.string(),
  recordId: z.string(),
});

/**
 * Decode a notification payload. Returns null for anything malformed.
 */
export function parseChangePayload(payload: string | undefined): RecordChange | null {
  if (!payload) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    logger.warn({ payload, error }, 'Discarding unparseable change notification');
    return null;
  }

  const parsed = RecordChangeSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ payload, issues: parsed.error.issues }, 'Discarding malformed change notification');
    return null;
  }
  return parsed.data;
}

export class PgChangeFeed implements ChangeFeed {
  private emitter = new EventEmitter();
  private client: PoolClient | null = null;
  private connecting: Promise<void> | null = null;

  constructor(private pool: Pick<Pool, 'connect'>) {
    // One listener per subscribed SSE client
    this.emitter.setMaxListeners(0);
  }

  subscribe(threadId: string, listener: ChangeListener): Unsubscribe {
    this.emitter.on(threadId, listener);
    this.ensureListening();

    return () => {
      this.emitter.off(threadId, listener);
    };
  }

  async close(): Promise<void> {
    this.emitter.removeAllListeners();
    if (this.connecting) {
      await this.connecting;
    }

    const client = this.client;
    this.client = null;
    if (client) {
      try {
        await client.query(`UNLISTEN ${CHANGE_CHANNEL}`);
      } finally {
        // The pool installs its own idle error handler on release
        client.removeAllListeners('notification');
        client.removeAllListeners('error');
        client.release();
      }
    }
  }

  private ensureListening(): void {
    if (this.client || this.connecting) {
      return;
    }

    this.connecting = this.listen()
      .catch((error: unknown) => {
        logger.error({ error }, 'Failed to start change feed; will retry on next subscribe');
      })
      .finally(() => {
        this.connecting = null;
      });
  }

  private async listen(): Promise<void> {
    const client = await this.pool.connect();
    let released = false;
    const releaseOnce = (error?: Error) => {
      if (!released) {
        released = true;
        client.release(error);
      }
    };

    client.on('notification', (msg: Notification) => {
      if (msg.channel !== CHANGE_CHANNEL) {
        return;
      }
      const change = parseChangePayload(msg.payload);
      if (change) {
        this.emitter.emit(change.threadId, change);
      }
    });

    client.on('error', (error: Error) => {
      logger.error({ error }, 'Change feed connection lost');
      if (this.client === client) {
        this.client = null;
      }
      releaseOnce(error);

      // Existing subscribers keep watching; reconnect for them
      if (this.emitter.eventNames().length > 0) {
        this.ensureListening();
      }
    });

    try {
      await client.query(`LISTEN ${CHANGE_CHANNEL}`);
    } catch (error) {
      releaseOnce(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
    this.client = client;
    logger.info({ channel: CHANGE_CHANNEL }, 'Change feed listening');
  }
}
