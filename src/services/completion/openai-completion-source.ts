/**
 * OpenAI-compatible Completion Source
 *
 * Streams chat completions from any OpenAI-compatible endpoint
 * (OPENAI_BASE_URL selects e.g. a gateway or a local server).
 */

import OpenAI from 'openai';
import type { LLMConfig } from '../../config/llm.js';
import { LLMError, type CompletionRequest, type CompletionSource } from '../../types/llm.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'openai-completion-source' });

export interface OpenAICompletionSourceOptions {
  config: LLMConfig;
  /** Pre-built client; one is created from `config.openai` otherwise */
  client?: OpenAI;
}

export class OpenAICompletionSource implements CompletionSource {
  readonly name = 'openai';
  private client: OpenAI;
  private config: LLMConfig;

  constructor(options: OpenAICompletionSourceOptions) {
    this.config = options.config;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.config.openai.apiKey,
        baseURL: options.config.openai.baseURL,
      });
  }

  async *generate(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<string, void, unknown> {
    const model = request.responder.model ?? this.config.defaultModel;

    logger.debug(
      { runId: request.runId, model, messageCount: request.messages.length, format: request.responseFormat },
      'Starting completion stream'
    );

    try {
      const stream = await this.client.chat.completions.create(
        {
          model,
          messages: request.messages,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          stream: true,
          response_format: request.responseFormat === 'json' ? { type: 'json_object' } : undefined,
        },
        { signal }
      );

      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (error) {
      logger.error({ error, runId: request.runId, model }, 'Completion stream error');
      throw toLLMError(error);
    }
  }
}

function toLLMError(error: unknown): LLMError {
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    const status = error.status;
    if (status === 429) return new LLMError(error.message, 'rate_limit', true, status, error);
    if (status === 401 || status === 403) return new LLMError(error.message, 'authentication', false, status, error);
    if (status === 404) return new LLMError(error.message, 'not_found', false, status, error);
    if (status === 400 || status === 422) return new LLMError(error.message, 'invalid_request', false, status, error);
    if (status >= 500) return new LLMError(error.message, 'server_error', true, status, error);
  }
  return LLMError.fromError(error);
}
