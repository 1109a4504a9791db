/**
 * Streaming run and message types
 */

export type RunState = 'initializing' | 'streaming' | 'complete' | 'failed';

export const ACTIVE_RUN_STATES: readonly RunState[] = ['initializing', 'streaming'];

/**
 * One in-flight (or finished) response generation.
 * `finalRecordId` is set if and only if `state` is `complete`.
 */
export interface StreamingRun {
  id: string;
  threadId: string;
  roomId: string;
  responderId: string;
  sourceMessageId: string;
  content: string;
  state: RunState;
  finalRecordId: string | null;
  failureReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface StreamingRunRow {
  id: string;
  thread_id: string;
  room_id: string;
  responder_id: string;
  source_message_id: string;
  content: string;
  state: RunState;
  final_record_id: string | null;
  failure_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Correlation keys for a run; enough to create or upsert its row
 */
export type StreamingRunKey = Pick<
  StreamingRun,
  'id' | 'threadId' | 'roomId' | 'responderId' | 'sourceMessageId'
>;

export type SenderKind = 'human' | 'responder';

/**
 * Permanent, write-once message record
 */
export interface Message {
  id: string;
  threadId: string;
  content: string;
  senderKind: SenderKind;
  senderId: string;
  inReplyTo: string | null;
  createdAt: Date;
}

export interface MessageRow {
  id: string;
  thread_id: string;
  content: string;
  sender_kind: SenderKind;
  sender_id: string;
  in_reply_to: string | null;
  created_at: Date;
}

export function isActiveRun(run: Pick<StreamingRun, 'state'>): boolean {
  return ACTIVE_RUN_STATES.includes(run.state);
}

export function mapStreamingRunRow(row: StreamingRunRow): StreamingRun {
  return {
    id: row.id,
    threadId: row.thread_id,
    roomId: row.room_id,
    responderId: row.responder_id,
    sourceMessageId: row.source_message_id,
    content: row.content,
    state: row.state,
    finalRecordId: row.final_record_id,
    failureReason: row.failure_reason,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function mapMessageRow(row: MessageRow): Message {
  return {
    id: row.id,
    threadId: row.thread_id,
    content: row.content,
    senderKind: row.sender_kind,
    senderId: row.sender_id,
    inReplyTo: row.in_reply_to,
    createdAt: new Date(row.created_at),
  };
}
