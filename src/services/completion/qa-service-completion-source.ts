/**
 * QA Service Completion Source
 *
 * Streams answers from the retrieval-augmented QA HTTP service. The service
 * answers with newline-delimited JSON frames:
 *   {"status": "answering", "chunk": "..."}   one per increment
 *   {"status": "complete"}                     end of answer
 *   {"status": "error", "message": "..."}      provider failure
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LLMConfig } from '../../config/llm.js';
import { LLMError, type ChatMessage, type CompletionRequest, type CompletionSource } from '../../types/llm.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'qa-service-completion-source' });

export const PROFESSIONAL_STREAM_PATH = '/api/qa/professional-stream';

const frameSchema = z.object({
  status: z.enum(['answering', 'complete', 'error']),
  chunk: z.string().optional(),
  message: z.string().optional(),
});

export interface QaHistoryEntry {
  Question: string;
  Answer: string;
}

export interface QaServiceOptions {
  config: LLMConfig['qaService'];
  defaultModel: string;
  timeoutMs?: number;
}

export class QaServiceCompletionSource implements CompletionSource {
  readonly name = 'qa-service';
  private client: AxiosInstance;
  private config: LLMConfig['qaService'];
  private defaultModel: string;

  constructor(options: QaServiceOptions) {
    this.config = options.config;
    this.defaultModel = options.defaultModel;
    this.client = axios.create({
      baseURL: options.config.baseURL,
      timeout: options.timeoutMs ?? 120_000,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async *generate(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<string, void, unknown> {
    const { responder } = request;
    const systemPrompt = request.messages.find((message) => message.role === 'system')?.content ?? '';

    let body: AsyncIterable<Buffer | string>;
    try {
      const response = await this.client.post<AsyncIterable<Buffer | string>>(
        PROFESSIONAL_STREAM_PATH,
        {
          question_text: request.question,
          model: responder.model ?? this.defaultModel,
          ai_info: {
            id: responder.id,
            name: responder.name,
            description: responder.description,
            personality: responder.personality,
            system_prompt: systemPrompt,
          },
          room_id: request.roomId,
          top_k: this.config.topK,
          histories_chat: buildQaHistory(request.messages),
          embedding_model: this.config.embeddingModel,
        },
        { responseType: 'stream', signal }
      );
      body = response.data;
    } catch (error) {
      logger.error({ error, runId: request.runId }, 'QA service request failed');
      throw LLMError.fromError(error);
    }

    yield* decodeAnswerStream(body);
  }
}

/**
 * Decode NDJSON answer frames into text increments. Malformed lines are
 * skipped; a stream that ends without a complete frame ends the answer.
 */
export async function* decodeAnswerStream(
  chunks: AsyncIterable<Buffer | string>
): AsyncGenerator<string, void, unknown> {
  const decoder = new TextDecoder();
  let pending = '';

  try {
    for await (const chunk of chunks) {
      pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        const line = pending.slice(0, newline);
        pending = pending.slice(newline + 1);
        const frame = parseFrame(line);

        if (frame?.status === 'answering' && frame.chunk) {
          yield frame.chunk;
        } else if (frame?.status === 'complete') {
          return;
        } else if (frame?.status === 'error') {
          throw new LLMError(frame.message ?? 'QA service reported an error', 'server_error', true);
        }
        newline = pending.indexOf('\n');
      }
    }
  } catch (error) {
    throw LLMError.fromError(error);
  }

  const last = parseFrame(pending + decoder.decode());
  if (last?.status === 'answering' && last.chunk) {
    yield last.chunk;
  } else if (last?.status === 'error') {
    throw new LLMError(last.message ?? 'QA service reported an error', 'server_error', true);
  }
}

/**
 * Question/answer pairs the service expects as history. Only a user turn
 * immediately answered by an assistant turn forms a pair.
 */
export function buildQaHistory(messages: ChatMessage[]): QaHistoryEntry[] {
  const turns = messages.filter((message) => message.role !== 'system');
  const history: QaHistoryEntry[] = [];

  for (let i = 0; i + 1 < turns.length; i++) {
    if (turns[i].role === 'user' && turns[i + 1].role === 'assistant') {
      history.push({ Question: turns[i].content, Answer: turns[i + 1].content });
    }
  }
  return history;
}

function parseFrame(line: string): z.infer<typeof frameSchema> | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch (error) {
    logger.warn({ error, line: trimmed.slice(0, 200) }, 'Skipping malformed answer frame');
    return null;
  }

  const parsed = frameSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ line: trimmed.slice(0, 200) }, 'Skipping unrecognized answer frame');
    return null;
  }
  return parsed.data;
}
