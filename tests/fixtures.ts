/**
 * Shared test fixtures: responders, messages and a scripted completion source
 */

import type { CompletionRequest, CompletionSource } from '../src/types/llm.js';
import type { ModeratorResponder, SelectionFormat, StandardResponder } from '../src/types/responder.js';
import type { Message } from '../src/types/streaming.js';

export function standardResponder(id: string, name: string, extra: Partial<StandardResponder> = {}): StandardResponder {
  return {
    id,
    name,
    instructions: `You are ${name}.`,
    description: null,
    personality: null,
    model: null,
    role: 'standard',
    ...extra,
  };
}

export function moderatorResponder(
  id: string,
  name: string,
  selectionFormat: SelectionFormat = 'marker'
): ModeratorResponder {
  return {
    id,
    name,
    instructions: 'Route each question to the right mentor.',
    description: null,
    personality: null,
    model: null,
    role: 'moderator',
    selectionFormat,
  };
}

export function humanMessage(id: string, threadId: string, senderId: string, content: string, at: Date): Message {
  return { id, threadId, content, senderKind: 'human', senderId, inReplyTo: null, createdAt: at };
}

/**
 * One step of a scripted generation
 */
export type ScriptStep =
  | { type: 'delta'; text: string }
  | { type: 'error'; error: Error }
  /** Never settles unless the caller aborts */
  | { type: 'hang' };

/**
 * Completion source that replays a script per responder id
 */
export class ScriptedCompletionSource implements CompletionSource {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];
  private scripts: Map<string, ScriptStep[]> = new Map();

  script(responderId: string, steps: ScriptStep[]): this {
    this.scripts.set(responderId, steps);
    return this;
  }

  reply(responderId: string, ...deltas: string[]): this {
    return this.script(responderId, deltas.map((text) => ({ type: 'delta', text })));
  }

  async *generate(request: CompletionRequest): AsyncGenerator<string, void, unknown> {
    this.requests.push(request);
    for (const step of this.scripts.get(request.responder.id) ?? []) {
      if (step.type === 'delta') {
        yield step.text;
      } else if (step.type === 'error') {
        throw step.error;
      } else {
        await new Promise<never>(() => undefined);
      }
    }
  }
}
