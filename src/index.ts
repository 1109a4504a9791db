/**
 * Threadline Server
 * Main entry point: wires the record store and completion source, then serves HTTP
 */

// Load environment variables FIRST - before any other imports
import { config } from 'dotenv';
config();

import { fileURLToPath } from 'url';
import type { Server } from 'http';
import { createApp, type AppServices } from './app.js';
import { loadCoordinationConfig, loadRecordStoreDriver } from './config/coordination.js';
import { loadLLMConfig } from './config/llm.js';
import { createPool, testConnection } from './db/connection.js';
import { runMigrationsOnStartup } from './db/runMigrations.js';
import { createPgRecordStore } from './db/index.js';
import { createInMemoryRecordStore } from './db/memory/in-memory-record-store.js';
import type { RecordStore } from './db/record-store.js';
import { createCompletionSource } from './services/completion/index.js';
import { logger } from './utils/logger.js';

const PORT = process.env.PORT || 3000;

let server: Server | null = null;
let store: RecordStore | null = null;
let services: AppServices | null = null;
let shuttingDown = false;

async function openRecordStore(): Promise<RecordStore> {
  const driver = loadRecordStoreDriver();

  if (driver === 'memory') {
    logger.warn('Using the in-memory record store; locks are not shared across instances');
    return createInMemoryRecordStore();
  }

  const pool = createPool();
  if (!(await testConnection(pool))) {
    await pool.end();
    throw new Error('Database connection failed');
  }

  const migrationResult = await runMigrationsOnStartup(pool);
  if (!migrationResult.success) {
    await pool.end();
    throw new Error(`Database migration failed: ${migrationResult.error ?? 'unknown error'}`);
  }
  if (migrationResult.applied.length > 0) {
    logger.info({ applied: migrationResult.applied }, 'Database migrations applied successfully');
  }

  return createPgRecordStore(pool);
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  try {
    const coordination = loadCoordinationConfig();
    const llm = loadLLMConfig();

    store = await openRecordStore();
    const created = createApp({ store, completion: createCompletionSource(llm), config: coordination });
    services = created.services;

    server = created.app.listen(PORT, () => {
      logger.info({ port: PORT, env: process.env.NODE_ENV, provider: llm.provider }, 'Server started');
    });

    server.on('error', (error: Error) => {
      logger.error({ error }, 'Server error');
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown: stop accepting requests, cancel in-flight runs (which
 * releases their locks), close SSE clients and the record store.
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received');

  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');
    });
  }

  try {
    if (services) {
      await services.registry.shutdown();
      services.relay.shutdown();
    }
    if (store) {
      await store.close();
      logger.info('Record store closed');
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('uncaughtException', (error: Error) => {
  logger.error({ error }, 'Uncaught exception');
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  void shutdown('unhandledRejection');
});

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  void start();
}

export { start, shutdown };
