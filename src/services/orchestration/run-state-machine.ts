/**
 * Run State Machine
 *
 * Tracks the phase of one orchestration run and enforces the allowed
 * transitions. Durable run state lives in the record store; this is the
 * in-process view the orchestrator drives.
 */

import { EventEmitter } from 'events';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'run-state-machine' });

export enum RunPhase {
  INITIALIZING = 'initializing',
  STREAMING = 'streaming',
  COMPLETING = 'completing',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

/**
 * Key: from phase, Value: allowed destination phases
 */
const TRANSITIONS: Map<RunPhase, RunPhase[]> = new Map([
  [RunPhase.INITIALIZING, [RunPhase.STREAMING, RunPhase.FAILED]],
  [RunPhase.STREAMING, [RunPhase.COMPLETING, RunPhase.FAILED]],
  // Finalize can still fail on the store write
  [RunPhase.COMPLETING, [RunPhase.COMPLETE, RunPhase.FAILED]],

  // Terminal
  [RunPhase.COMPLETE, []],
  [RunPhase.FAILED, []],
]);

export interface RunTransitionEvent {
  runId: string;
  fromPhase: RunPhase;
  toPhase: RunPhase;
  timestamp: Date;
  phaseElapsedMs: number;
}

export class RunStateMachine extends EventEmitter {
  readonly runId: string;
  private phase: RunPhase = RunPhase.INITIALIZING;
  private phaseStartTime: Date;
  private readonly startTime: Date;
  private failureReason: string | null = null;

  constructor(runId: string) {
    super();
    this.runId = runId;
    this.startTime = new Date();
    this.phaseStartTime = this.startTime;
  }

  get currentPhase(): RunPhase {
    return this.phase;
  }

  get reason(): string | null {
    return this.failureReason;
  }

  isTerminal(): boolean {
    return this.phase === RunPhase.COMPLETE || this.phase === RunPhase.FAILED;
  }

  isValidTransition(fromPhase: RunPhase, toPhase: RunPhase): boolean {
    return TRANSITIONS.get(fromPhase)?.includes(toPhase) ?? false;
  }

  /**
   * Move to `toPhase`, throwing on a transition the table does not allow
   */
  transition(toPhase: RunPhase): void {
    const fromPhase = this.phase;

    if (!this.isValidTransition(fromPhase, toPhase)) {
      const error = `Invalid transition from ${fromPhase} to ${toPhase}`;
      logger.error({ runId: this.runId, fromPhase, toPhase }, error);
      throw new Error(error);
    }

    const now = new Date();
    const phaseElapsedMs = now.getTime() - this.phaseStartTime.getTime();
    this.phase = toPhase;
    this.phaseStartTime = now;

    logger.debug({ runId: this.runId, fromPhase, toPhase, phaseElapsedMs }, 'Run phase transition');

    const event: RunTransitionEvent = { runId: this.runId, fromPhase, toPhase, timestamp: now, phaseElapsedMs };
    this.emit('phase_transition', event);

    if (toPhase === RunPhase.COMPLETE) {
      this.emit('completed', this.runId, now.getTime() - this.startTime.getTime());
    }
  }

  /**
   * Fail from any non-terminal phase. Failing twice keeps the first reason.
   */
  fail(reason: string): void {
    if (this.isTerminal()) {
      return;
    }
    this.failureReason = reason;
    this.transition(RunPhase.FAILED);
    this.emit('failed', this.runId, reason);
  }
}
