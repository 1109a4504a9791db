/**
 * Core error taxonomy
 *
 * Lock conflicts are results, not exceptions (see LockResult). Provider
 * failures are LLMError. Moderator resolution misses are plain nulls.
 */

/**
 * A durable write or read failed. Fatal to the current run only.
 */
export class StoreError extends Error {
  public readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation}: ${message}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }

  static wrap(operation: string, error: unknown): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StoreError(operation, message, error);
  }
}

/** `lock_lost` and `superseded` runs no longer own the thread lock */
export type AbortReason = 'cancelled' | 'timeout' | 'lock_lost' | 'superseded';

/**
 * A run stopped before its completion source finished
 */
export class RunAbortedError extends Error {
  public readonly reason: AbortReason;

  constructor(reason: AbortReason, message?: string) {
    super(message ?? `Run aborted: ${reason}`);
    this.name = 'RunAbortedError';
    this.reason = reason;
  }
}

export class RecordNotFoundError extends Error {
  public readonly entity: string;
  public readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = 'RecordNotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Best-effort message extraction for logs and failure reasons
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
