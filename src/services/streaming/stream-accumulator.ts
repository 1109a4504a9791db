/**
 * Stream Accumulator
 *
 * Buffers text increments per run and batches durable writes. Readers of
 * the run row see a growing prefix of the final text; the permanent
 * message is written exactly once, by `finalize`.
 */

import type { RunStore } from '../../db/record-store.js';
import type { StreamingRunKey } from '../../types/streaming.js';
import { StoreError } from '../../types/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'stream-accumulator' });

interface RunBuffer {
  key: StreamingRunKey;
  content: string;
  /** Length of `content` at the last durable write */
  flushedLength: number;
}

export interface StreamAccumulatorOptions {
  runs: RunStore;
  flushThreshold: number;
}

export class StreamAccumulator {
  private runs: RunStore;
  private flushThreshold: number;
  private buffers: Map<string, RunBuffer> = new Map();

  constructor(options: StreamAccumulatorOptions) {
    this.runs = options.runs;
    this.flushThreshold = options.flushThreshold;
  }

  /**
   * Start buffering for a run and move it to streaming
   */
  async begin(key: StreamingRunKey): Promise<void> {
    this.buffers.set(key.id, { key, content: '', flushedLength: 0 });
    await this.runs.writeContent(key, '');
  }

  /**
   * Append an increment. Returns the accumulated length.
   */
  async append(runId: string, delta: string): Promise<number> {
    const buffer = this.require(runId, 'append');
    buffer.content += delta;

    if (buffer.content.length - buffer.flushedLength >= this.flushThreshold) {
      await this.flush(buffer);
    }

    return buffer.content.length;
  }

  /**
   * Accumulated text so far
   */
  contentOf(runId: string): string {
    return this.buffers.get(runId)?.content ?? '';
  }

  /**
   * Write the permanent message and mark the run complete.
   * Returns the id of the new message.
   */
  async finalize(runId: string, content: string): Promise<string> {
    const messageId = await this.runs.complete(runId, content);
    this.buffers.delete(runId);
    logger.debug({ runId, messageId, length: content.length }, 'Run finalized');
    return messageId;
  }

  /**
   * Mark the run failed. No message is written.
   */
  async fail(runId: string, reason: string): Promise<void> {
    this.buffers.delete(runId);
    const changed = await this.runs.fail(runId, reason);
    if (!changed) {
      logger.debug({ runId, reason }, 'Run already terminal when failing');
    }
  }

  discard(runId: string): void {
    this.buffers.delete(runId);
  }

  private async flush(buffer: RunBuffer): Promise<void> {
    const length = buffer.content.length;
    await this.runs.writeContent(buffer.key, buffer.content);
    buffer.flushedLength = length;
  }

  private require(runId: string, operation: string): RunBuffer {
    const buffer = this.buffers.get(runId);
    if (!buffer) {
      throw new StoreError(`accumulator.${operation}`, `Run ${runId} was never begun`);
    }
    return buffer;
  }
}
