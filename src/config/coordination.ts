/**
 * Coordination Configuration
 *
 * Lock windows, flush batching and context sizes. All of these are tunable
 * constants, not protocol invariants.
 */

import { getEnvChoice, getEnvInt } from './env.js';

export interface LockConfig {
  /** Window granted to a human composing a message */
  producerTtlMs: number;
  /** Window granted to a responder; generation may run long */
  responderTtlMs: number;
  /** Heartbeat period while a run is streaming */
  refreshIntervalMs: number;
}

export interface CoordinationConfig {
  locks: LockConfig;
  /** Unflushed characters that trigger a durable write */
  flushThreshold: number;
  /** Most recent thread messages included in the prompt context */
  historyLimit: number;
  /** Overall deadline for one run */
  runTimeoutMs: number;
}

export type RecordStoreDriver = 'postgres' | 'memory';

export const DEFAULT_COORDINATION_CONFIG: CoordinationConfig = {
  locks: {
    producerTtlMs: 30_000,
    responderTtlMs: 120_000,
    refreshIntervalMs: 60_000,
  },
  flushThreshold: 50,
  historyLimit: 10,
  runTimeoutMs: 300_000,
};

/**
 * Load coordination settings from environment variables
 */
export function loadCoordinationConfig(): CoordinationConfig {
  const defaults = DEFAULT_COORDINATION_CONFIG;
  const responderTtlMs = getEnvInt('RESPONDER_LOCK_TTL_MS', defaults.locks.responderTtlMs);

  return {
    locks: {
      producerTtlMs: getEnvInt('PRODUCER_LOCK_TTL_MS', defaults.locks.producerTtlMs),
      responderTtlMs,
      refreshIntervalMs: getEnvInt('LOCK_REFRESH_INTERVAL_MS', Math.floor(responderTtlMs / 2)),
    },
    flushThreshold: getEnvInt('STREAM_FLUSH_THRESHOLD', defaults.flushThreshold),
    historyLimit: getEnvInt('HISTORY_LIMIT', defaults.historyLimit),
    runTimeoutMs: getEnvInt('RUN_TIMEOUT_MS', defaults.runTimeoutMs),
  };
}

export function loadRecordStoreDriver(): RecordStoreDriver {
  return getEnvChoice<RecordStoreDriver>('RECORD_STORE', ['postgres', 'memory'], 'postgres');
}
