/**
 * Context Builder
 *
 * Assembles the prompt for one run: the responder's instructions, a bounded
 * window of thread history and, for moderators, the room roster they may
 * hand off to.
 */

import type { MessageStore, ResponderStore } from '../../db/record-store.js';
import type { ChatMessage, ResponseFormat } from '../../types/llm.js';
import type { Message } from '../../types/streaming.js';
import {
  isModerator,
  type ModeratorResponder,
  type Responder,
  type SelectionFormat,
} from '../../types/responder.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'context-builder' });

export const ROSTER_HEADING = '## Available AI Mentors in this room:';

export interface RunContext {
  messages: ChatMessage[];
  question: string;
  responseFormat: ResponseFormat;
  /** Active responders of the room; empty unless the responder moderates */
  roster: Responder[];
}

export interface ContextBuilderOptions {
  messages: MessageStore;
  responders: ResponderStore;
  historyLimit: number;
}

const FORMAT_INSTRUCTIONS: Record<SelectionFormat, string> = {
  marker:
    'Answer briefly, then hand the question to the best-suited mentor by ending with a line of the form: ' +
    'Forward to AI mentor: **<Name>**',
  structured:
    'Reply with a single JSON object of the form {"message": "<your reply>", "responder_id": "<AI ID>"}. ' +
    'Use null for responder_id when no mentor fits.',
  auto:
    'Answer briefly, then hand the question to the best-suited mentor by ending with a line of the form: ' +
    'Forward to AI mentor: **<Name>**',
};

export class ContextBuilder {
  private messages: MessageStore;
  private responders: ResponderStore;
  private historyLimit: number;

  constructor(options: ContextBuilderOptions) {
    this.messages = options.messages;
    this.responders = options.responders;
    this.historyLimit = options.historyLimit;
  }

  async build(responder: Responder, roomId: string, source: Message): Promise<RunContext> {
    const history = await this.messages.findRecent(source.threadId, this.historyLimit);
    if (!history.some((message) => message.id === source.id)) {
      history.push(source);
    }

    let systemPrompt = buildSystemPrompt(responder);
    let roster: Responder[] = [];

    if (isModerator(responder)) {
      roster = await this.responders.findActiveByRoom(roomId);
      systemPrompt += buildRosterSection(responder, roster);
      logger.debug({ responderId: responder.id, roomId, rosterSize: roster.length }, 'Moderator roster assembled');
    }

    return {
      messages: [{ role: 'system', content: systemPrompt }, ...history.map(toChatMessage)],
      question: source.content,
      responseFormat: isModerator(responder) && responder.selectionFormat === 'structured' ? 'json' : 'text',
      roster,
    };
  }
}

export function buildSystemPrompt(responder: Responder): string {
  const lines = [responder.instructions];
  if (responder.description) {
    lines.push(`Description: ${responder.description}`);
  }
  if (responder.personality) {
    lines.push(`Personality: ${responder.personality}`);
  }
  return lines.join('\n');
}

/**
 * Roster of hand-off targets. Moderators never appear in it.
 */
export function buildRosterSection(moderator: ModeratorResponder, roster: Responder[]): string {
  const candidates = roster.filter((responder) => !isModerator(responder));
  if (candidates.length === 0) {
    return '';
  }

  let section = `\n\n${ROSTER_HEADING}`;
  for (const candidate of candidates) {
    section += `\n- AI ID: ${candidate.id}, Name: ${candidate.name}`;
    if (candidate.description) {
      section += `. Description: ${candidate.description}`;
    }
    if (candidate.personality) {
      section += `. Personality: ${candidate.personality}`;
    }
    section += '.';
  }
  return `${section}\n\n${FORMAT_INSTRUCTIONS[moderator.selectionFormat]}`;
}

function toChatMessage(message: Message): ChatMessage {
  return {
    role: message.senderKind === 'human' ? 'user' : 'assistant',
    content: message.content,
  };
}
