/**
 * Abort helpers for draining async sequences
 */

import { RunAbortedError } from '../types/errors.js';
import { createLogger } from './logger.js';

const logger = createLogger({ module: 'abortable' });

/**
 * The error a signal was aborted with, as an Error
 */
export function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new RunAbortedError('cancelled');
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortError(signal);
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }

    const onAbort = () => reject(abortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Re-yield `source` until it ends or `signal` aborts. Each pending `next()`
 * is raced against the signal, so a source that ignores the signal cannot
 * hold the consumer open.
 */
export async function* abortable<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  let exhausted = false;

  try {
    while (true) {
      const result = await raceAbort(iterator.next(), signal);
      if (result.done) {
        exhausted = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!exhausted && iterator.return) {
      // Not awaited: the source may be stuck in a pending next()
      iterator.return().catch((error: unknown) => {
        logger.debug({ error }, 'Source rejected while closing');
      });
    }
  }
}
