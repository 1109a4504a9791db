/**
 * Thread API Routes
 *
 * Lock status and client pre-acquisition, response invocation, run
 * snapshots and cancellation, and the per-thread event stream.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { LockCoordinator } from '../services/locks/lock-coordinator.js';
import type { ResponseOrchestrator } from '../services/orchestration/response-orchestrator.js';
import type { ThreadEventRelay } from '../services/sse/thread-event-relay.js';
import type { LockConflict } from '../types/locks.js';
import { RecordNotFoundError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ module: 'thread-routes' });

// ===========================================================================
// Validation Schemas
// ===========================================================================

const AcquireLockSchema = z.object({
  participantId: z.string().min(1),
});

const ReleaseLockSchema = z.object({
  holderId: z.string().min(1),
});

const StartResponseSchema = z.object({
  roomId: z.string().min(1),
  userMessageId: z.string().min(1),
  responderId: z.string().min(1),
});

export interface ThreadRoutesDeps {
  locks: LockCoordinator;
  orchestrator: ResponseOrchestrator;
  relay: ThreadEventRelay;
}

function conflictBody(conflict: Pick<LockConflict, 'holderId' | 'kind' | 'retryAfterSeconds'>) {
  return {
    error: 'Thread busy',
    holderId: conflict.holderId,
    kind: conflict.kind,
    retryAfter: conflict.retryAfterSeconds,
  };
}

export function createThreadRoutes(deps: ThreadRoutesDeps): Router {
  const { locks, orchestrator, relay } = deps;
  const router = Router();

  /**
   * GET /api/threads/:threadId/lock
   * Live lock on the thread, or null
   */
  router.get('/threads/:threadId/lock', async (req, res) => {
    const { threadId } = req.params;

    try {
      const lock = await locks.inspect(threadId);
      return res.json({ success: true, data: lock });
    } catch (error) {
      logger.error({ threadId, error }, 'Failed to read thread lock');
      return res.status(500).json({ error: 'Internal server error', message: 'Failed to read thread lock' });
    }
  });

  /**
   * POST /api/threads/:threadId/lock
   * Producer lock for a participant about to write
   */
  router.post('/threads/:threadId/lock', async (req, res) => {
    const { threadId } = req.params;

    const parsed = AcquireLockSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Validation error', details: parsed.error.errors });
    }

    try {
      const result = await locks.acquireProducer(threadId, parsed.data.participantId);
      if (!result.granted) {
        res.setHeader('Retry-After', String(result.retryAfterSeconds));
        return res.status(409).json(conflictBody(result));
      }
      return res.json({ success: true, data: result.lock });
    } catch (error) {
      logger.error({ threadId, error }, 'Failed to acquire thread lock');
      return res.status(500).json({ error: 'Internal server error', message: 'Failed to acquire thread lock' });
    }
  });

  /**
   * DELETE /api/threads/:threadId/lock
   * Release a lock the caller holds; releasing a lock not held is a no-op
   */
  router.delete('/threads/:threadId/lock', async (req, res) => {
    const { threadId } = req.params;

    const parsed = ReleaseLockSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Validation error', details: parsed.error.errors });
    }

    try {
      await locks.release(threadId, parsed.data.holderId);
      return res.status(204).end();
    } catch (error) {
      logger.error({ threadId, error }, 'Failed to release thread lock');
      return res.status(500).json({ error: 'Internal server error', message: 'Failed to release thread lock' });
    }
  });

  /**
   * POST /api/threads/:threadId/responses
   * Ask a responder to answer a message. Returns before generation starts.
   */
  router.post('/threads/:threadId/responses', async (req, res) => {
    const { threadId } = req.params;

    const parsed = StartResponseSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Validation error', details: parsed.error.errors });
    }

    try {
      const result = await orchestrator.start({ threadId, ...parsed.data });

      if (result.status === 'conflict') {
        res.setHeader('Retry-After', String(result.retryAfterSeconds));
        return res.status(409).json(conflictBody(result));
      }

      return res.status(202).json({ runId: result.runId, status: result.status });
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        return res.status(404).json({ error: `${error.entity} not found`, id: error.id });
      }
      logger.error({ threadId, error }, 'Failed to start response');
      return res.status(500).json({ error: 'Internal server error', message: 'Failed to start response' });
    }
  });

  /**
   * GET /api/runs/:runId
   * Current snapshot of a streaming run
   */
  router.get('/runs/:runId', async (req, res) => {
    const { runId } = req.params;

    try {
      const run = await orchestrator.getRun(runId);
      if (!run) {
        return res.status(404).json({ error: 'Run not found' });
      }
      return res.json({ success: true, data: run });
    } catch (error) {
      logger.error({ runId, error }, 'Failed to fetch run');
      return res.status(500).json({ error: 'Internal server error', message: 'Failed to fetch run' });
    }
  });

  /**
   * POST /api/runs/:runId/cancel
   * Cancel a run executing on this instance
   */
  router.post('/runs/:runId/cancel', (req, res) => {
    const { runId } = req.params;

    if (!orchestrator.cancel(runId)) {
      return res.status(404).json({ error: 'Run not active on this instance' });
    }

    logger.info({ runId }, 'Run cancellation requested');
    return res.status(202).json({ runId, status: 'cancelling' });
  });

  /**
   * GET /api/threads/:threadId/events
   * Server-Sent Events stream of thread changes
   */
  router.get('/threads/:threadId/events', (req, res) => {
    const { threadId } = req.params;
    const lastEventId = req.header('Last-Event-ID');

    const clientId = relay.connect(threadId, res, lastEventId);

    req.on('close', () => {
      relay.disconnect(clientId);
    });
  });

  return router;
}
