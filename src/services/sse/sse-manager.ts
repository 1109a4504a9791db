/**
 * Server-Sent Events (SSE) Manager
 * Fans thread events out to every connected client of the thread
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../utils/logger.js';
import type { SSEClient, SSEEvent, SSEEventType, SSEStream } from '../../types/sse.js';

const logger = createLogger({ module: 'SSEManager' });

export interface SSEManagerOptions {
  /** Comment heartbeat period; keeps proxies from closing idle streams */
  heartbeatIntervalMs?: number;
}

export class SSEManager {
  /** Map of client ID to SSEClient */
  private clients: Map<string, SSEClient> = new Map();

  private readonly heartbeatInterval: number;

  /** Runs only while at least one client is connected */
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(options: SSEManagerOptions = {}) {
    this.heartbeatInterval = options.heartbeatIntervalMs ?? 15000;
  }

  /**
   * Register a new SSE client connection. Sets SSE headers and sends the
   * initial `connected` event.
   */
  registerClient(threadId: string, res: SSEStream, lastEventId?: string): string {
    const clientId = uuidv4();

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const client: SSEClient = {
      id: clientId,
      threadId,
      res,
      connectedAt: new Date(),
      lastEventId: lastEventId || null,
    };

    this.clients.set(clientId, client);
    this.startHeartbeat();

    logger.info({ clientId, threadId, totalClients: this.clients.size }, 'SSE client registered');

    this.sendToClient(clientId, 'connected', { threadId, clientId });

    return clientId;
  }

  /**
   * Remove a client and close its connection.
   * Returns the thread it was watching, or null for an unknown client.
   */
  unregisterClient(clientId: string): string | null {
    const client = this.clients.get(clientId);

    if (!client) {
      logger.debug({ clientId }, 'Attempted to unregister unknown client');
      return null;
    }

    this.clients.delete(clientId);

    if (!client.res.writableEnded) {
      client.res.end();
    }

    if (this.clients.size === 0) {
      this.stopHeartbeat();
    }

    logger.info({ clientId, threadId: client.threadId, totalClients: this.clients.size }, 'SSE client unregistered');
    return client.threadId;
  }

  /**
   * Broadcast an event to all clients watching a thread
   */
  broadcastToThread<T = unknown>(threadId: string, eventType: SSEEventType, data: T): void {
    const threadClients = Array.from(this.clients.values()).filter((client) => client.threadId === threadId);

    if (threadClients.length === 0) {
      logger.debug({ threadId, eventType }, 'No clients to broadcast to');
      return;
    }

    const eventId = uuidv4();

    for (const client of threadClients) {
      try {
        this.sendEvent(client.res, eventType, data, eventId);
        client.lastEventId = eventId;
      } catch (error) {
        logger.error({ clientId: client.id, threadId, error }, 'Failed to send event to client');
        this.unregisterClient(client.id);
      }
    }
  }

  sendToClient<T = unknown>(clientId: string, eventType: SSEEventType, data: T): void {
    const client = this.clients.get(clientId);

    if (!client) {
      logger.warn({ clientId, eventType }, 'Client not found');
      return;
    }

    try {
      const eventId = uuidv4();
      this.sendEvent(client.res, eventType, data, eventId);
      client.lastEventId = eventId;
    } catch (error) {
      logger.error({ clientId, eventType, error }, 'Failed to send event to client');
      this.unregisterClient(clientId);
    }
  }

  /**
   * Write one event in SSE wire format
   */
  sendEvent<T = unknown>(res: SSEStream, eventType: SSEEventType, data: T, eventId?: string): void {
    if (res.writableEnded) {
      throw new Error('Response stream already ended');
    }

    const event: SSEEvent<T> = {
      type: eventType,
      data,
      timestamp: new Date().toISOString(),
      ...(eventId && { id: eventId }),
    };

    let message = '';
    if (eventId) {
      message += `id: ${eventId}\n`;
    }
    message += `event: ${eventType}\n`;
    message += `data: ${JSON.stringify(event)}\n\n`;

    res.write(message);
  }

  sendHeartbeat(res: SSEStream): void {
    if (!res.writableEnded) {
      res.write(': heartbeat\n\n');
    }
  }

  getClientCount(threadId?: string): number {
    if (!threadId) {
      return this.clients.size;
    }
    return Array.from(this.clients.values()).filter((client) => client.threadId === threadId).length;
  }

  private startHeartbeat(): void {
    if (this.heartbeatTimer) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      const clientsToRemove: string[] = [];

      for (const [clientId, client] of this.clients.entries()) {
        try {
          this.sendHeartbeat(client.res);
        } catch (error) {
          logger.warn({ clientId, error }, 'Heartbeat failed, marking client for removal');
          clientsToRemove.push(clientId);
        }
      }

      for (const clientId of clientsToRemove) {
        this.unregisterClient(clientId);
      }
    }, this.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /**
   * Close every client connection and stop the heartbeat
   */
  shutdown(): void {
    logger.info({ clientCount: this.clients.size }, 'Shutting down SSE manager');
    this.stopHeartbeat();

    for (const [clientId, client] of this.clients.entries()) {
      try {
        this.sendEvent(client.res, 'error', { threadId: client.threadId, error: 'Server shutting down' });
        client.res.end();
      } catch (error) {
        logger.error({ clientId, error }, 'Error closing client connection');
      }
    }

    this.clients.clear();
  }
}
