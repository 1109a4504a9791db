/**
 * Response Orchestrator
 *
 * Entry point for "a responder should answer this message". `start` only
 * waits for the lock hand-off and the run row; generation continues in the
 * background under the run registry.
 *
 * Run sequence: retire (and abort) stale runs, assemble context, stream from the
 * completion source into the accumulator, finalize, then always release
 * the lock (unless it was lost) and, for moderators, maybe chain once.
 */

import { v4 as uuidv4 } from 'uuid';
import type { RecordStore } from '../../db/record-store.js';
import type { CoordinationConfig } from '../../config/coordination.js';
import type { LockKind } from '../../types/locks.js';
import type { Message, StreamingRun, StreamingRunKey } from '../../types/streaming.js';
import { isModerator, type Responder } from '../../types/responder.js';
import { RecordNotFoundError, RunAbortedError, errorMessage } from '../../types/errors.js';
import { LLMError, type CompletionSource } from '../../types/llm.js';
import { LockCoordinator } from '../locks/lock-coordinator.js';
import { StreamAccumulator } from '../streaming/stream-accumulator.js';
import { ContextBuilder } from './context-builder.js';
import { ModeratorChainer, type ChainedRunRequest } from './moderator-chainer.js';
import { RunPhase, RunStateMachine } from './run-state-machine.js';
import { RunRegistry } from './run-registry.js';
import { createSelectionDecoder } from './selection-decoders.js';
import { abortable, throwIfAborted } from '../../utils/abortable.js';
import { createLogger, createRunLogger, type Logger } from '../../utils/logger.js';

const logger = createLogger({ module: 'response-orchestrator' });

export interface StartResponseRequest {
  threadId: string;
  roomId: string;
  userMessageId: string;
  responderId: string;
}

export type StartResponseResult =
  | { status: 'processing'; runId: string }
  | { status: 'conflict'; retryAfterSeconds: number; holderId: string; kind: LockKind };

interface StartOptions {
  /** Moderator output may start one further run */
  chain: boolean;
  /** Participant asking for the lock; defaults to the message sender */
  requestedBy?: string;
}

export interface ResponseOrchestratorOptions {
  store: RecordStore;
  locks: LockCoordinator;
  completion: CompletionSource;
  registry: RunRegistry;
  config: CoordinationConfig;
  generateId?: () => string;
}

/** Failure reason recorded when a newer run supersedes a stale one */
export const SUPERSEDED_REASON = 'superseded by a newer run';

export class ResponseOrchestrator {
  private store: RecordStore;
  private locks: LockCoordinator;
  private completion: CompletionSource;
  private registry: RunRegistry;
  private config: CoordinationConfig;
  private generateId: () => string;
  private accumulator: StreamAccumulator;
  private contextBuilder: ContextBuilder;
  private chainer: ModeratorChainer;

  constructor(options: ResponseOrchestratorOptions) {
    this.store = options.store;
    this.locks = options.locks;
    this.completion = options.completion;
    this.registry = options.registry;
    this.config = options.config;
    this.generateId = options.generateId ?? uuidv4;
    this.accumulator = new StreamAccumulator({
      runs: options.store.runs,
      flushThreshold: options.config.flushThreshold,
    });
    this.contextBuilder = new ContextBuilder({
      messages: options.store.messages,
      responders: options.store.responders,
      historyLimit: options.config.historyLimit,
    });
    this.chainer = new ModeratorChainer((request) => this.startChained(request));
  }

  /**
   * Hand the thread to a responder and start generating in the background
   */
  async start(request: StartResponseRequest): Promise<StartResponseResult> {
    return this.startRun(request, { chain: true });
  }

  async getRun(runId: string): Promise<StreamingRun | null> {
    return this.store.runs.findById(runId);
  }

  /**
   * Cancel a run executing in this process. Cleanup still runs.
   */
  cancel(runId: string): boolean {
    return this.registry.cancel(runId);
  }

  private async startRun(request: StartResponseRequest, options: StartOptions): Promise<StartResponseResult> {
    const { threadId, roomId, userMessageId, responderId } = request;

    const source = await this.store.messages.findById(userMessageId);
    if (!source || source.threadId !== threadId) {
      throw new RecordNotFoundError('Message', userMessageId);
    }

    const responder = await this.store.responders.findById(responderId);
    if (!responder) {
      throw new RecordNotFoundError('Responder', responderId);
    }

    const requestedBy = options.requestedBy ?? source.senderId;
    const lock = await this.locks.transitionToResponder(threadId, requestedBy, responderId);
    if (!lock.granted) {
      logger.info(
        { threadId, responderId, holderId: lock.holderId, kind: lock.kind },
        'Thread busy, response not started'
      );
      return {
        status: 'conflict',
        retryAfterSeconds: lock.retryAfterSeconds,
        holderId: lock.holderId,
        kind: lock.kind,
      };
    }

    const key: StreamingRunKey = {
      id: this.generateId(),
      threadId,
      roomId,
      responderId,
      sourceMessageId: source.id,
    };

    try {
      const retired = await this.store.runs.retireActive(threadId, responderId, SUPERSEDED_REASON);
      if (retired.length > 0) {
        logger.warn({ threadId, responderId, retired }, 'Retired stale runs');
      }
      // A stale run still executing here holds no lock any more; stop it before it releases ours
      for (const runId of retired) {
        this.registry.abort(runId, 'superseded');
      }
      await this.store.runs.create(key);
    } catch (error) {
      await this.releaseQuietly(threadId, responderId, logger);
      throw error;
    }

    this.registry.spawn(key.id, threadId, (signal) => this.execute(key, responder, source, signal, options.chain));
    logger.info({ runId: key.id, threadId, responderId }, 'Response run started');

    return { status: 'processing', runId: key.id };
  }

  private async startChained(request: ChainedRunRequest): Promise<string | null> {
    const result = await this.startRun(
      {
        threadId: request.threadId,
        roomId: request.roomId,
        userMessageId: request.sourceMessageId,
        responderId: request.responderId,
      },
      { chain: false, requestedBy: request.requestedBy }
    );
    return result.status === 'processing' ? result.runId : null;
  }

  private async execute(
    run: StreamingRunKey,
    responder: Responder,
    source: Message,
    registrySignal: AbortSignal,
    chain: boolean
  ): Promise<void> {
    const log = createRunLogger(run.id, run.threadId, responder.id);
    const machine = new RunStateMachine(run.id);
    const controller = new AbortController();
    let lockLost = false;
    const decoder = isModerator(responder) ? createSelectionDecoder(responder.selectionFormat) : null;

    const forwardAbort = () => controller.abort(registrySignal.reason);
    if (registrySignal.aborted) {
      forwardAbort();
    } else {
      registrySignal.addEventListener('abort', forwardAbort, { once: true });
    }

    const timeout = setTimeout(() => {
      controller.abort(new RunAbortedError('timeout'));
    }, this.config.runTimeoutMs);

    let refreshing = false;
    const heartbeat = setInterval(() => {
      if (refreshing || controller.signal.aborted) {
        return;
      }
      refreshing = true;
      void this.locks
        .refresh(run.threadId, responder.id)
        .then(
          (result) => {
            if (!result.refreshed) {
              lockLost = true;
              log.warn({ current: result.current?.holderId ?? null }, 'Lock lost during run');
              controller.abort(new RunAbortedError('lock_lost'));
            }
          },
          (error: unknown) => {
            log.warn({ error }, 'Lock refresh failed');
          }
        )
        .finally(() => {
          refreshing = false;
        });
    }, this.config.locks.refreshIntervalMs);

    let output: string | null = null;
    let roster: Responder[] = [];

    try {
      const context = await this.contextBuilder.build(responder, run.roomId, source);
      roster = context.roster;
      throwIfAborted(controller.signal);

      await this.accumulator.begin(run);
      machine.transition(RunPhase.STREAMING);

      const increments = this.completion.generate(
        {
          runId: run.id,
          threadId: run.threadId,
          roomId: run.roomId,
          responder,
          messages: context.messages,
          question: context.question,
          responseFormat: context.responseFormat,
        },
        controller.signal
      );

      for await (const delta of abortable(increments, controller.signal)) {
        await this.accumulator.append(run.id, delta);
      }

      throwIfAborted(controller.signal);
      machine.transition(RunPhase.COMPLETING);

      const raw = this.accumulator.contentOf(run.id);
      const content = decoder ? decoder.displayText(raw) : raw;
      const messageId = await this.accumulator.finalize(run.id, content);
      machine.transition(RunPhase.COMPLETE);
      output = raw;

      log.info({ messageId, length: content.length }, 'Run complete');
    } catch (error) {
      const reason = describeFailure(error);
      machine.fail(reason);

      if (error instanceof RunAbortedError) {
        log.warn({ reason: error.reason }, 'Run aborted');
      } else {
        log.error({ error }, 'Run failed');
      }

      try {
        await this.accumulator.fail(run.id, reason);
      } catch (failError) {
        log.error({ error: failError }, 'Failed to mark run failed');
      }
    } finally {
      clearTimeout(timeout);
      clearInterval(heartbeat);
      registrySignal.removeEventListener('abort', forwardAbort);
      this.accumulator.discard(run.id);

      if (lockLost || ownsNoLock(controller.signal) || (await this.wasSuperseded(run.id, log))) {
        log.warn('Skipping release of a lock no longer held');
      } else {
        await this.releaseQuietly(run.threadId, responder.id, log);
      }
    }

    if (output !== null && chain && isModerator(responder)) {
      try {
        await this.chainer.maybeChain(run.threadId, run.roomId, source.id, responder, output, roster);
      } catch (error) {
        log.error({ error }, 'Chained run could not start');
      }
    }
  }

  /**
   * A run retired by another instance shares its responder's holder id with
   * the run that replaced it; releasing would drop the newer lock.
   */
  private async wasSuperseded(runId: string, log: Logger): Promise<boolean> {
    try {
      const row = await this.store.runs.findById(runId);
      return row?.state === 'failed' && row.failureReason === SUPERSEDED_REASON;
    } catch (error) {
      log.warn({ error }, 'Could not re-read run before release');
      return false;
    }
  }

  private async releaseQuietly(threadId: string, holderId: string, log: Logger): Promise<void> {
    try {
      await this.locks.release(threadId, holderId);
    } catch (error) {
      log.error({ error, threadId, holderId }, 'Lock release failed');
    }
  }
}

function ownsNoLock(signal: AbortSignal): boolean {
  return signal.reason instanceof RunAbortedError && signal.reason.reason === 'superseded';
}

/**
 * Reason stored on a failed run
 */
export function describeFailure(error: unknown): string {
  if (error instanceof RunAbortedError) {
    return `aborted: ${error.reason}`;
  }
  if (error instanceof LLMError) {
    return `provider error (${error.code}): ${error.message}`;
  }
  return errorMessage(error);
}
