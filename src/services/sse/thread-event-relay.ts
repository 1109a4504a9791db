/**
 * Thread Event Relay
 *
 * Bridges record store change notifications to SSE clients. One change
 * feed subscription per watched thread; notifications carry ids only, so
 * each one is resolved to the current row before it is sent.
 */

import type { RecordStore } from '../../db/record-store.js';
import type { RecordChange, Unsubscribe } from '../../types/changes.js';
import type { SSEStream } from '../../types/sse.js';
import type { LockCoordinator } from '../locks/lock-coordinator.js';
import type { SSEManager } from './sse-manager.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'thread-event-relay' });

export class ThreadEventRelay {
  private subscriptions: Map<string, Unsubscribe> = new Map();

  constructor(
    private store: RecordStore,
    private locks: LockCoordinator,
    private sse: SSEManager
  ) {}

  connect(threadId: string, res: SSEStream, lastEventId?: string): string {
    const clientId = this.sse.registerClient(threadId, res, lastEventId);

    if (!this.subscriptions.has(threadId)) {
      const unsubscribe = this.store.changes.subscribe(threadId, (change) => {
        this.relay(change).catch((error: unknown) => {
          logger.error({ error, change }, 'Failed to relay change');
        });
      });
      this.subscriptions.set(threadId, unsubscribe);
      logger.debug({ threadId }, 'Subscribed to thread changes');
    }

    return clientId;
  }

  disconnect(clientId: string): void {
    const threadId = this.sse.unregisterClient(clientId);
    if (threadId && this.sse.getClientCount(threadId) === 0) {
      this.subscriptions.get(threadId)?.();
      this.subscriptions.delete(threadId);
      logger.debug({ threadId }, 'Unsubscribed from thread changes');
    }
  }

  getWatchedThreadIds(): string[] {
    return Array.from(this.subscriptions.keys());
  }

  async relay(change: RecordChange): Promise<void> {
    switch (change.table) {
      case 'streaming_runs': {
        const run = await this.store.runs.findById(change.recordId);
        if (run) {
          this.sse.broadcastToThread(change.threadId, 'run_updated', run);
        }
        return;
      }
      case 'messages': {
        const message = await this.store.messages.findById(change.recordId);
        if (message) {
          this.sse.broadcastToThread(change.threadId, 'message_created', message);
        }
        return;
      }
      case 'thread_locks': {
        const lock = await this.locks.inspect(change.threadId);
        this.sse.broadcastToThread(change.threadId, 'lock_changed', { threadId: change.threadId, lock });
        return;
      }
    }
  }

  shutdown(): void {
    for (const unsubscribe of this.subscriptions.values()) {
      unsubscribe();
    }
    this.subscriptions.clear();
    this.sse.shutdown();
  }
}
