/**
 * Completion source types
 *
 * Type definitions for the generative-response providers a run drains,
 * and the error class every provider failure is normalized to.
 */

import type { Responder } from './responder.js';

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message structure
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Output shape requested from the provider
 */
export type ResponseFormat = 'text' | 'json';

/**
 * Everything a completion source needs for one generation
 */
export interface CompletionRequest {
  runId: string;
  threadId: string;
  roomId: string;
  responder: Responder;
  /** System prompt first, then history oldest-first, ending with the source message */
  messages: ChatMessage[];
  /** Content of the message being answered */
  question: string;
  responseFormat: ResponseFormat;
}

/**
 * A provider of text increments.
 *
 * The returned sequence is finite and not restartable; it may throw at any
 * point, including before the first increment.
 */
export interface CompletionSource {
  readonly name: string;
  generate(request: CompletionRequest, signal?: AbortSignal): AsyncIterable<string>;
}

/**
 * LLM error codes
 */
export type LLMErrorCode =
  | 'rate_limit'        // Rate limit exceeded
  | 'timeout'           // Request timed out
  | 'invalid_request'   // Invalid request parameters
  | 'server_error'      // Server-side error
  | 'authentication'    // Authentication failed
  | 'not_found'         // Resource not found
  | 'unknown';          // Unknown error

/**
 * Provider failure, raised before or during a stream
 */
export class LLMError extends Error {
  /** Error code categorizing the error type */
  public readonly code: LLMErrorCode;
  /** Whether a fresh request could succeed; the core itself never retries */
  public readonly retryable: boolean;
  /** HTTP status code if applicable */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: LLMErrorCode,
    retryable: boolean,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'LLMError';
    this.code = code;
    this.retryable = retryable;
    this.statusCode = statusCode;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  /**
   * Create an LLMError from an unknown error
   */
  static fromError(error: unknown, defaultCode: LLMErrorCode = 'unknown'): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('rate limit') || message.includes('429')) {
        return new LLMError(error.message, 'rate_limit', true, 429, error);
      }

      if (message.includes('timeout') || message.includes('timed out')) {
        return new LLMError(error.message, 'timeout', true, undefined, error);
      }

      if (message.includes('authentication') || message.includes('unauthorized') || message.includes('401')) {
        return new LLMError(error.message, 'authentication', false, 401, error);
      }

      if (message.includes('not found') || message.includes('404')) {
        return new LLMError(error.message, 'not_found', false, 404, error);
      }

      if (message.includes('invalid') || message.includes('bad request') || message.includes('400')) {
        return new LLMError(error.message, 'invalid_request', false, 400, error);
      }

      if (message.includes('server error') || message.includes('500') || message.includes('503')) {
        return new LLMError(error.message, 'server_error', true, 500, error);
      }

      return new LLMError(error.message, defaultCode, false, undefined, error);
    }

    return new LLMError(String(error), defaultCode, false);
  }
}
