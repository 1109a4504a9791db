/**
 * Completion Provider Configuration
 *
 * Selects and configures the completion source runs are drained from.
 */

import { getEnvChoice, getEnvInt, getEnvVar } from './env.js';

export type CompletionProviderName = 'openai' | 'qa-service';

export interface LLMConfig {
  provider: CompletionProviderName;
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  qaService: {
    baseURL: string;
    topK: number;
    embeddingModel: string;
  };
  /** Model used when a responder has no override */
  defaultModel: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Load provider settings from environment variables
 */
export function loadLLMConfig(): LLMConfig {
  const provider = getEnvChoice<CompletionProviderName>('COMPLETION_PROVIDER', ['openai', 'qa-service'], 'openai');

  return {
    provider,
    openai: {
      apiKey: getEnvVar('OPENAI_API_KEY', provider === 'openai'),
      baseURL: getEnvVar('OPENAI_BASE_URL') || undefined,
    },
    qaService: {
      baseURL: getEnvVar('QA_SERVICE_URL', provider === 'qa-service'),
      topK: getEnvInt('QA_TOP_K', 10),
      embeddingModel: getEnvVar('QA_EMBEDDING_MODEL', false, 'embedding-001'),
    },
    defaultModel: getEnvVar('DEFAULT_MODEL', false, 'gpt-4o-mini'),
    temperature: 0.7,
    maxTokens: getEnvInt('MAX_TOKENS', 1024),
  };
}
