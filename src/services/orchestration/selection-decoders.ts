/**
 * Selection Decoders
 *
 * Interchangeable strategies for reading a moderator's hand-off out of its
 * output. Decoders only extract a reference; checking it against the room
 * roster is the chainer's job.
 */

import { z } from 'zod';
import type { ResponderRef, SelectionFormat } from '../../types/responder.js';

export interface SelectionDecoder {
  resolveSelection(output: string): ResponderRef | null;
  /** The part of the output shown to participants as the moderator's message */
  displayText(output: string): string;
}

/**
 * `Forward to AI mentor: **Name**`, with or without the bold markers
 */
const MARKER_PATTERN = /forward to ai mentor:\s*(?:\*\*([^*\n]+?)\*\*|([^\n.*]+))/i;

export class MarkerSelectionDecoder implements SelectionDecoder {
  resolveSelection(output: string): ResponderRef | null {
    const match = MARKER_PATTERN.exec(output);
    if (!match) {
      return null;
    }

    const name = (match[1] ?? match[2] ?? '').trim();
    return name ? { by: 'name', name } : null;
  }

  displayText(output: string): string {
    return output;
  }
}

const selectionSchema = z
  .object({
    message: z.string().nullish(),
    responder_id: z.string().nullish(),
    ai_id: z.string().nullish(),
  })
  .passthrough();

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

export class StructuredSelectionDecoder implements SelectionDecoder {
  resolveSelection(output: string): ResponderRef | null {
    const selection = parseSelection(output);
    if (!selection) {
      return null;
    }

    const id = [selection.responder_id, selection.ai_id].map((value) => value?.trim() ?? '').find(Boolean);
    return id ? { by: 'id', id } : null;
  }

  /**
   * The `message` field when the output is a selection object, else the
   * output unchanged
   */
  displayText(output: string): string {
    const message = parseSelection(output)?.message?.trim();
    return message || output;
  }
}

/**
 * First decoder with an answer wins
 */
export class CompositeSelectionDecoder implements SelectionDecoder {
  constructor(private decoders: SelectionDecoder[]) {}

  resolveSelection(output: string): ResponderRef | null {
    for (const decoder of this.decoders) {
      const ref = decoder.resolveSelection(output);
      if (ref) {
        return ref;
      }
    }
    return null;
  }

  displayText(output: string): string {
    for (const decoder of this.decoders) {
      const text = decoder.displayText(output);
      if (text !== output) {
        return text;
      }
    }
    return output;
  }
}

export function createSelectionDecoder(format: SelectionFormat): SelectionDecoder {
  switch (format) {
    case 'marker':
      return new MarkerSelectionDecoder();
    case 'structured':
      return new StructuredSelectionDecoder();
    case 'auto':
      return new CompositeSelectionDecoder([new StructuredSelectionDecoder(), new MarkerSelectionDecoder()]);
  }
}

function parseSelection(output: string): z.infer<typeof selectionSchema> | null {
  const json = parseJsonObject(output);
  if (json === undefined) {
    return null;
  }
  const parsed = selectionSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function parseJsonObject(output: string): unknown {
  const fenced = FENCE_PATTERN.exec(output);
  const candidate = (fenced ? fenced[1] : output).trim();
  if (!candidate.startsWith('{')) {
    return undefined;
  }

  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}
