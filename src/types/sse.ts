/**
 * Server-Sent Events types
 */

export type SSEEventType =
  | 'connected'
  | 'run_updated'
  | 'message_created'
  | 'lock_changed'
  | 'error';

/**
 * The part of an Express response an SSE connection writes through
 */
export interface SSEStream {
  readonly writableEnded: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
}

export interface SSEClient {
  id: string;
  threadId: string;
  res: SSEStream;
  connectedAt: Date;
  lastEventId: string | null;
}

export interface SSEEvent<T = unknown> {
  id?: string;
  type: SSEEventType;
  data: T;
  timestamp: string;
}
