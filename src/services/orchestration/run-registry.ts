/**
 * Run Registry
 *
 * Tracks runs executing in this process so they can be cancelled, and so
 * shutdown can wait for them to wind down.
 */

import { RunAbortedError, type AbortReason } from '../../types/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'RunRegistry' });

interface RegisteredRun {
  threadId: string;
  controller: AbortController;
  task: Promise<void>;
}

export class RunRegistry {
  private runs: Map<string, RegisteredRun> = new Map();

  /**
   * Spawn `execute` in the background under a fresh abort controller.
   * The run unregisters itself when `execute` settles.
   */
  spawn(runId: string, threadId: string, execute: (signal: AbortSignal) => Promise<void>): void {
    const controller = new AbortController();
    logger.info({ runId, threadId }, 'Registering run');

    const task = execute(controller.signal)
      .catch((error: unknown) => {
        logger.error({ runId, threadId, error }, 'Run task rejected');
      })
      .finally(() => {
        this.runs.delete(runId);
        logger.info({ runId, threadId }, 'Unregistered run');
      });

    this.runs.set(runId, { threadId, controller, task });
  }

  /**
   * Abort a run. Returns false when it is not running here.
   */
  abort(runId: string, reason: AbortReason): boolean {
    const run = this.runs.get(runId);
    if (!run) {
      return false;
    }
    if (!run.controller.signal.aborted) {
      logger.info({ runId, threadId: run.threadId, reason }, 'Aborting run');
      run.controller.abort(new RunAbortedError(reason));
    }
    return true;
  }

  cancel(runId: string): boolean {
    return this.abort(runId, 'cancelled');
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  getCount(): number {
    return this.runs.size;
  }

  /**
   * Resolves once every registered run has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.runs.size > 0) {
      await Promise.all(Array.from(this.runs.values(), (run) => run.task));
    }
  }

  /**
   * Cancel everything and wait for cleanup to finish
   */
  async shutdown(): Promise<void> {
    for (const runId of this.runs.keys()) {
      this.cancel(runId);
    }
    await this.waitForIdle();
  }
}
