/**
 * SSE Manager and Thread Event Relay Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SSEManager } from '../src/services/sse/sse-manager.js';
import { ThreadEventRelay } from '../src/services/sse/thread-event-relay.js';
import { LockCoordinator } from '../src/services/locks/lock-coordinator.js';
import { InMemoryRecordStore } from '../src/db/memory/in-memory-record-store.js';
import { DEFAULT_COORDINATION_CONFIG } from '../src/config/coordination.js';
import type { SSEStream } from '../src/types/sse.js';
import { humanMessage } from './fixtures.js';

class FakeStream implements SSEStream {
  writableEnded = false;
  headers: Record<string, string> = {};
  chunks: string[] = [];
  flushed = false;

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  flushHeaders(): void {
    this.flushed = true;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  end(): this {
    this.writableEnded = true;
    return this;
  }

  /** Parsed `data:` payloads of the events written so far */
  events(): Array<{ event: string; data: { type: string; data: unknown } }> {
    return this.chunks
      .filter((chunk) => chunk.includes('event: '))
      .map((chunk) => {
        const event = /event: (.+)\n/.exec(chunk)?.[1] ?? '';
        const data = /data: (.+)\n/.exec(chunk)?.[1] ?? '{}';
        return { event, data: JSON.parse(data) };
      });
  }
}

describe('SSEManager', () => {
  let manager: SSEManager;

  beforeEach(() => {
    manager = new SSEManager({ heartbeatIntervalMs: 1000 });
  });

  afterEach(() => {
    manager.shutdown();
    vi.useRealTimers();
  });

  it('sets stream headers and announces the connection', () => {
    const res = new FakeStream();

    const clientId = manager.registerClient('T1', res);

    expect(res.headers['Content-Type']).toBe('text/event-stream');
    expect(res.headers['Cache-Control']).toBe('no-cache');
    expect(res.flushed).toBe(true);
    expect(res.events()).toEqual([
      { event: 'connected', data: expect.objectContaining({ type: 'connected', data: { threadId: 'T1', clientId } }) },
    ]);
  });

  it('broadcasts only to clients of the thread', () => {
    const a = new FakeStream();
    const b = new FakeStream();
    manager.registerClient('T1', a);
    manager.registerClient('T2', b);

    manager.broadcastToThread('T1', 'lock_changed', { threadId: 'T1', lock: null });

    expect(a.events().map((e) => e.event)).toEqual(['connected', 'lock_changed']);
    expect(b.events().map((e) => e.event)).toEqual(['connected']);
    expect(manager.getClientCount('T1')).toBe(1);
    expect(manager.getClientCount()).toBe(2);
  });

  it('writes events in wire format with a shared id', () => {
    const res = new FakeStream();

    manager.sendEvent(res, 'message_created', { id: 'm1' }, 'evt-1');

    expect(res.chunks[0]).toMatch(/^id: evt-1\nevent: message_created\ndata: \{.*\}\n\n$/);
  });

  it('ends the stream on unregister and reports the thread', () => {
    const res = new FakeStream();
    const clientId = manager.registerClient('T1', res);

    expect(manager.unregisterClient(clientId)).toBe('T1');
    expect(res.writableEnded).toBe(true);
    expect(manager.unregisterClient(clientId)).toBeNull();
  });

  it('drops a client whose stream has ended', () => {
    const res = new FakeStream();
    manager.registerClient('T1', res);
    res.writableEnded = true;

    manager.broadcastToThread('T1', 'run_updated', {});

    expect(manager.getClientCount('T1')).toBe(0);
  });

  it('sends heartbeats only while clients are connected', () => {
    vi.useFakeTimers();
    manager = new SSEManager({ heartbeatIntervalMs: 1000 });
    const res = new FakeStream();
    const clientId = manager.registerClient('T1', res);

    vi.advanceTimersByTime(2500);
    expect(res.chunks.filter((chunk) => chunk === ': heartbeat\n\n')).toHaveLength(2);

    manager.unregisterClient(clientId);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('ThreadEventRelay', () => {
  let store: InMemoryRecordStore;
  let locks: LockCoordinator;
  let sse: SSEManager;
  let relay: ThreadEventRelay;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    locks = new LockCoordinator({ store: store.locks, config: DEFAULT_COORDINATION_CONFIG.locks });
    sse = new SSEManager();
    relay = new ThreadEventRelay(store, locks, sse);
  });

  afterEach(() => {
    relay.shutdown();
  });

  it('relays lock changes with the current lock', async () => {
    const res = new FakeStream();
    relay.connect('T1', res);

    await locks.acquireProducer('T1', 'u1');

    await vi.waitFor(() => expect(res.events().map((e) => e.event)).toContain('lock_changed'));
    const event = res.events().find((e) => e.event === 'lock_changed');
    expect(event?.data.data).toMatchObject({ threadId: 'T1', lock: { holderId: 'u1', kind: 'producer' } });
  });

  it('relays new messages and run progress', async () => {
    const res = new FakeStream();
    relay.connect('T1', res);

    store.addMessage(humanMessage('m1', 'T1', 'u1', 'hello', new Date()));
    await store.runs.create({ id: 'R1', threadId: 'T1', roomId: 'room-1', responderId: 'ds', sourceMessageId: 'm1' });

    await vi.waitFor(() => expect(res.events()).toHaveLength(3));
    expect(res.events().map((e) => e.event)).toEqual(['connected', 'message_created', 'run_updated']);
    expect(res.events()[1].data.data).toMatchObject({ id: 'm1', content: 'hello' });
    expect(res.events()[2].data.data).toMatchObject({ id: 'R1', state: 'initializing' });
  });

  it('subscribes once per thread and unsubscribes with the last client', () => {
    const first = relay.connect('T1', new FakeStream());
    const second = relay.connect('T1', new FakeStream());
    expect(relay.getWatchedThreadIds()).toEqual(['T1']);

    relay.disconnect(first);
    expect(relay.getWatchedThreadIds()).toEqual(['T1']);

    relay.disconnect(second);
    expect(relay.getWatchedThreadIds()).toEqual([]);
  });
});
