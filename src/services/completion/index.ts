/**
 * Completion sources
 */

import type { LLMConfig } from '../../config/llm.js';
import type { CompletionSource } from '../../types/llm.js';
import { OpenAICompletionSource } from './openai-completion-source.js';
import { QaServiceCompletionSource } from './qa-service-completion-source.js';

export { OpenAICompletionSource } from './openai-completion-source.js';
export { QaServiceCompletionSource, decodeAnswerStream, buildQaHistory } from './qa-service-completion-source.js';

export function createCompletionSource(config: LLMConfig): CompletionSource {
  switch (config.provider) {
    case 'openai':
      return new OpenAICompletionSource({ config });
    case 'qa-service':
      return new QaServiceCompletionSource({ config: config.qaService, defaultModel: config.defaultModel });
  }
}
