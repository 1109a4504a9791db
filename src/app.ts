/**
 * Express application
 *
 * Built from already-wired services so the server entry point and the
 * route tests share one construction path.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { RecordStore } from './db/record-store.js';
import type { CoordinationConfig } from './config/coordination.js';
import type { CompletionSource } from './types/llm.js';
import { LockCoordinator } from './services/locks/lock-coordinator.js';
import { ResponseOrchestrator } from './services/orchestration/response-orchestrator.js';
import { RunRegistry } from './services/orchestration/run-registry.js';
import { SSEManager } from './services/sse/sse-manager.js';
import { ThreadEventRelay } from './services/sse/thread-event-relay.js';
import { createThreadRoutes } from './routes/thread-routes.js';
import { logger } from './utils/logger.js';

export interface AppDeps {
  store: RecordStore;
  completion: CompletionSource;
  config: CoordinationConfig;
  now?: () => Date;
}

export interface AppServices {
  locks: LockCoordinator;
  registry: RunRegistry;
  orchestrator: ResponseOrchestrator;
  relay: ThreadEventRelay;
}

export interface CreatedApp {
  app: Express;
  services: AppServices;
}

export function createServices(deps: AppDeps): AppServices {
  const locks = new LockCoordinator({ store: deps.store.locks, config: deps.config.locks, now: deps.now });
  const registry = new RunRegistry();
  const orchestrator = new ResponseOrchestrator({
    store: deps.store,
    locks,
    completion: deps.completion,
    registry,
    config: deps.config,
  });
  const relay = new ThreadEventRelay(deps.store, locks, new SSEManager());

  return { locks, registry, orchestrator, relay };
}

export function createApp(deps: AppDeps): CreatedApp {
  const services = createServices(deps);
  const app = express();

  // Enable CORS for all routes
  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', process.env.FRONTEND_URL || '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Last-Event-ID');
    res.setHeader('Access-Control-Expose-Headers', 'Content-Type, Last-Event-ID, Retry-After');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json());

  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      activeRuns: services.registry.getCount(),
      watchedThreads: services.relay.getWatchedThreadIds().length,
      completionSource: deps.completion.name,
    });
  });

  app.use('/api', createThreadRoutes(services));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error: err, path: req.path }, 'Unhandled error');

    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return { app, services };
}
