/**
 * In-memory record store
 *
 * A single-process stand-in for the PostgreSQL store, used for local
 * development (RECORD_STORE=memory) and tests. Every method body runs
 * without awaiting, so each operation is atomic within the event loop.
 * It is authoritative only for the process that owns it.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type {
  ChangeFeed,
  LockStore,
  MessageStore,
  RecordStore,
  ResponderStore,
  RunStore,
} from '../record-store.js';
import { StoreError } from '../../types/errors.js';
import type { NewThreadLock, ThreadLock, ThreadLockChanges } from '../../types/locks.js';
import {
  isActiveRun,
  type Message,
  type StreamingRun,
  type StreamingRunKey,
} from '../../types/streaming.js';
import type { Responder } from '../../types/responder.js';
import type { ChangeListener, RecordChange, Unsubscribe } from '../../types/changes.js';

export type Clock = () => Date;

interface RoomRegistration {
  responderId: string;
  isActive: boolean;
}

export class MemoryChangeFeed implements ChangeFeed {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  subscribe(threadId: string, listener: ChangeListener): Unsubscribe {
    this.emitter.on(threadId, listener);
    return () => {
      this.emitter.off(threadId, listener);
    };
  }

  publish(change: RecordChange): void {
    // Listeners run after the write's own call stack, like a database notification
    queueMicrotask(() => this.emitter.emit(change.threadId, change));
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}

export class MemoryLockStore implements LockStore {
  private rows = new Map<string, ThreadLock>();

  constructor(private feed: MemoryChangeFeed) {}

  async get(threadId: string): Promise<ThreadLock | null> {
    const row = this.rows.get(threadId);
    return row ? { ...row } : null;
  }

  async insertIfAbsent(lock: NewThreadLock, now: Date): Promise<ThreadLock | null> {
    const existing = this.rows.get(lock.threadId);
    if (existing && existing.expiresAt.getTime() > now.getTime()) {
      return null;
    }

    const row: ThreadLock = { ...lock, version: existing ? existing.version + 1 : 1 };
    this.rows.set(lock.threadId, row);
    this.feed.publish({
      table: 'thread_locks',
      op: existing ? 'update' : 'insert',
      threadId: lock.threadId,
      recordId: lock.threadId,
    });
    return { ...row };
  }

  async compareAndUpdate(
    threadId: string,
    expectedVersion: number,
    changes: ThreadLockChanges
  ): Promise<ThreadLock | null> {
    const existing = this.rows.get(threadId);
    if (!existing || existing.version !== expectedVersion) {
      return null;
    }

    const row: ThreadLock = { ...existing, ...changes, version: existing.version + 1 };
    this.rows.set(threadId, row);
    this.feed.publish({ table: 'thread_locks', op: 'update', threadId, recordId: threadId });
    return { ...row };
  }

  async compareAndDelete(threadId: string, expectedVersion: number): Promise<boolean> {
    const existing = this.rows.get(threadId);
    if (!existing || existing.version !== expectedVersion) {
      return false;
    }

    this.rows.delete(threadId);
    this.feed.publish({ table: 'thread_locks', op: 'delete', threadId, recordId: threadId });
    return true;
  }
}

export class MemoryMessageStore implements MessageStore {
  readonly rows: Message[] = [];

  async findById(id: string): Promise<Message | null> {
    const message = this.rows.find((row) => row.id === id);
    return message ? { ...message } : null;
  }

  async findRecent(threadId: string, limit: number = 10): Promise<Message[]> {
    const thread = this.rows
      .filter((row) => row.threadId === threadId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    return thread.slice(Math.max(0, thread.length - limit)).map((row) => ({ ...row }));
  }
}

export class MemoryRunStore implements RunStore {
  private rows = new Map<string, StreamingRun>();

  constructor(
    private messages: MemoryMessageStore,
    private feed: MemoryChangeFeed,
    private now: Clock
  ) {}

  async create(run: StreamingRunKey): Promise<StreamingRun> {
    if (this.rows.has(run.id)) {
      throw new StoreError('runs.create', `Run ${run.id} already exists`);
    }

    const at = this.now();
    const row: StreamingRun = {
      ...run,
      content: '',
      state: 'initializing',
      finalRecordId: null,
      failureReason: null,
      createdAt: at,
      updatedAt: at,
    };
    this.rows.set(run.id, row);
    this.publish(row, 'insert');
    return { ...row };
  }

  async findById(id: string): Promise<StreamingRun | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async retireActive(threadId: string, responderId: string, reason: string): Promise<string[]> {
    const retired: string[] = [];
    for (const row of this.rows.values()) {
      if (row.threadId === threadId && row.responderId === responderId && isActiveRun(row)) {
        this.update(row, { state: 'failed', failureReason: reason });
        retired.push(row.id);
      }
    }
    return retired;
  }

  async writeContent(run: StreamingRunKey, content: string): Promise<void> {
    const existing = this.rows.get(run.id);
    if (!existing) {
      const at = this.now();
      const row: StreamingRun = {
        ...run,
        content,
        state: 'streaming',
        finalRecordId: null,
        failureReason: null,
        createdAt: at,
        updatedAt: at,
      };
      this.rows.set(run.id, row);
      this.publish(row, 'insert');
      return;
    }

    if (isActiveRun(existing)) {
      this.update(existing, { content, state: 'streaming' });
    }
  }

  async complete(runId: string, content: string): Promise<string> {
    const existing = this.rows.get(runId);
    if (!existing) {
      throw new StoreError('runs.complete', `Run ${runId} not found`);
    }
    if (!isActiveRun(existing)) {
      throw new StoreError('runs.complete', `Run ${runId} is already ${existing.state}`);
    }

    const message: Message = {
      id: uuidv4(),
      threadId: existing.threadId,
      content,
      senderKind: 'responder',
      senderId: existing.responderId,
      inReplyTo: existing.sourceMessageId,
      createdAt: this.now(),
    };
    this.messages.rows.push(message);
    this.update(existing, { content, state: 'complete', finalRecordId: message.id });
    this.feed.publish({ table: 'messages', op: 'insert', threadId: message.threadId, recordId: message.id });
    return message.id;
  }

  async fail(runId: string, reason: string): Promise<boolean> {
    const existing = this.rows.get(runId);
    if (!existing || !isActiveRun(existing)) {
      return false;
    }
    this.update(existing, { state: 'failed', failureReason: reason });
    return true;
  }

  all(): StreamingRun[] {
    return Array.from(this.rows.values()).map((row) => ({ ...row }));
  }

  private update(row: StreamingRun, changes: Partial<StreamingRun>): void {
    const next: StreamingRun = { ...row, ...changes, updatedAt: this.now() };
    this.rows.set(row.id, next);
    this.publish(next, 'update');
  }

  private publish(row: StreamingRun, op: 'insert' | 'update'): void {
    this.feed.publish({ table: 'streaming_runs', op, threadId: row.threadId, recordId: row.id });
  }
}

export class MemoryResponderStore implements ResponderStore {
  private responders = new Map<string, Responder>();
  private rooms = new Map<string, RoomRegistration[]>();
  private inactive = new Set<string>();

  async findById(id: string): Promise<Responder | null> {
    const responder = this.responders.get(id);
    return responder ? { ...responder } : null;
  }

  async findActiveByRoom(roomId: string): Promise<Responder[]> {
    const registrations = this.rooms.get(roomId) ?? [];
    const active: Responder[] = [];
    for (const registration of registrations) {
      const responder = this.responders.get(registration.responderId);
      if (responder && registration.isActive && !this.inactive.has(responder.id)) {
        active.push({ ...responder });
      }
    }
    return active.sort((a, b) => a.name.localeCompare(b.name));
  }

  put(responder: Responder, roomIds: string[], isActive: boolean): void {
    this.responders.set(responder.id, responder);
    if (isActive) {
      this.inactive.delete(responder.id);
    } else {
      this.inactive.add(responder.id);
    }
    for (const roomId of roomIds) {
      const registrations = (this.rooms.get(roomId) ?? []).filter((r) => r.responderId !== responder.id);
      registrations.push({ responderId: responder.id, isActive: true });
      this.rooms.set(roomId, registrations);
    }
  }
}

export interface InMemoryRecordStoreOptions {
  now?: Clock;
}

export class InMemoryRecordStore implements RecordStore {
  readonly locks: LockStore;
  readonly runs: MemoryRunStore;
  readonly messages: MemoryMessageStore;
  readonly responders: MemoryResponderStore;
  readonly changes: MemoryChangeFeed;
  private now: Clock;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.changes = new MemoryChangeFeed();
    this.locks = new MemoryLockStore(this.changes);
    this.messages = new MemoryMessageStore();
    this.runs = new MemoryRunStore(this.messages, this.changes, this.now);
    this.responders = new MemoryResponderStore();
  }

  /**
   * Register a responder, optionally into rooms
   */
  addResponder(responder: Responder, roomIds: string[] = [], options: { isActive?: boolean } = {}): void {
    this.responders.put(responder, roomIds, options.isActive ?? true);
  }

  /**
   * Record a message written outside the core (human messages)
   */
  addMessage(message: Omit<Message, 'createdAt'> & { createdAt?: Date }): Message {
    const row: Message = { ...message, createdAt: message.createdAt ?? this.now() };
    this.messages.rows.push(row);
    this.changes.publish({ table: 'messages', op: 'insert', threadId: row.threadId, recordId: row.id });
    return { ...row };
  }

  async close(): Promise<void> {
    this.changes.clear();
  }
}

export function createInMemoryRecordStore(options: InMemoryRecordStoreOptions = {}): InMemoryRecordStore {
  return new InMemoryRecordStore(options);
}
