/**
 * Record change notifications
 *
 * Fire-and-forget, at-least-once, no ordering guarantee between tables.
 * Payloads carry identifiers only; subscribers re-read the row.
 */

export type ChangeTable = 'thread_locks' | 'streaming_runs' | 'messages';

export type ChangeOperation = 'insert' | 'update' | 'delete';

export interface RecordChange {
  table: ChangeTable;
  op: ChangeOperation;
  threadId: string;
  recordId: string;
}

export type ChangeListener = (change: RecordChange) => void;

/** Call to stop receiving changes */
export type Unsubscribe = () => void;
