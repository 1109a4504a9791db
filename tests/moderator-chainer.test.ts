/**
 * Selection Decoder and Moderator Chainer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CompositeSelectionDecoder,
  MarkerSelectionDecoder,
  StructuredSelectionDecoder,
  createSelectionDecoder,
} from '../src/services/orchestration/selection-decoders.js';
import { ModeratorChainer, resolveResponder } from '../src/services/orchestration/moderator-chainer.js';
import { moderatorResponder, standardResponder } from './fixtures.js';

const dataScientist = standardResponder('ds', 'Data Scientist');
const pythonExpert = standardResponder('py', 'Python Expert');

describe('MarkerSelectionDecoder', () => {
  const decoder = new MarkerSelectionDecoder();

  it('reads a bold name after the marker', () => {
    expect(decoder.resolveSelection('Forward to AI mentor: **Data Scientist**. Reason is ...')).toEqual({
      by: 'name',
      name: 'Data Scientist',
    });
  });

  it('matches case-insensitively and without bold', () => {
    expect(decoder.resolveSelection('Good question.\nforward to ai mentor: Python Expert.')).toEqual({
      by: 'name',
      name: 'Python Expert',
    });
  });

  it('returns null without a marker', () => {
    expect(decoder.resolveSelection('I can answer this myself.')).toBeNull();
  });
});

describe('StructuredSelectionDecoder', () => {
  const decoder = new StructuredSelectionDecoder();

  it('reads responder_id from a JSON object', () => {
    expect(decoder.resolveSelection('{"message": "Over to the expert", "responder_id": "py"}')).toEqual({
      by: 'id',
      id: 'py',
    });
  });

  it('accepts ai_id inside a json fence', () => {
    const output = '```json\n{"message": "hi", "ai_id": "ds"}\n```';
    expect(decoder.resolveSelection(output)).toEqual({ by: 'id', id: 'ds' });
  });

  it('falls back to ai_id when responder_id is blank', () => {
    expect(decoder.resolveSelection('{"responder_id": "", "ai_id": "ds"}')).toEqual({ by: 'id', id: 'ds' });
    expect(decoder.resolveSelection('{"responder_id": "  ", "ai_id": " py "}')).toEqual({ by: 'id', id: 'py' });
  });

  it('shows the message field as display text', () => {
    expect(decoder.displayText('{"message": "Over to the expert", "responder_id": "py"}')).toBe('Over to the expert');
    expect(decoder.displayText('```json\n{"message": "hi", "ai_id": "ds"}\n```')).toBe('hi');
  });

  it('shows the whole output when there is no message field', () => {
    expect(decoder.displayText('{"responder_id": "py"}')).toBe('{"responder_id": "py"}');
    expect(decoder.displayText('Plain answer.')).toBe('Plain answer.');
  });

  it('returns null for a null id, plain text or broken JSON', () => {
    expect(decoder.resolveSelection('{"message": "none fit", "responder_id": null}')).toBeNull();
    expect(decoder.resolveSelection('Forward to AI mentor: **Data Scientist**')).toBeNull();
    expect(decoder.resolveSelection('{"responder_id": ')).toBeNull();
  });
});

describe('createSelectionDecoder', () => {
  it('tries structured output before the marker in auto mode', () => {
    const decoder = createSelectionDecoder('auto');

    expect(decoder).toBeInstanceOf(CompositeSelectionDecoder);
    expect(decoder.resolveSelection('{"responder_id": "py"}')).toEqual({ by: 'id', id: 'py' });
    expect(decoder.resolveSelection('Forward to AI mentor: **Data Scientist**')).toEqual({
      by: 'name',
      name: 'Data Scientist',
    });
  });

  it('takes display text from a structured reply and keeps marker replies whole', () => {
    const decoder = createSelectionDecoder('auto');
    const marker = 'Good question.\nForward to AI mentor: **Data Scientist**';

    expect(decoder.displayText('{"message": "Over to you", "responder_id": "py"}')).toBe('Over to you');
    expect(decoder.displayText(marker)).toBe(marker);
  });
});

describe('resolveResponder', () => {
  const roster = [dataScientist, pythonExpert, moderatorResponder('mod', 'Data Scientist Moderator')];

  it('matches names ignoring case and surrounding whitespace', () => {
    expect(resolveResponder({ by: 'name', name: '  data scientist ' }, roster)).toBe(dataScientist);
  });

  it('matches ids exactly', () => {
    expect(resolveResponder({ by: 'id', id: 'py' }, roster)).toBe(pythonExpert);
    expect(resolveResponder({ by: 'id', id: 'PY' }, roster)).toBeNull();
  });

  it('never resolves to a moderator', () => {
    expect(resolveResponder({ by: 'name', name: 'Data Scientist Moderator' }, roster)).toBeNull();
    expect(resolveResponder({ by: 'id', id: 'mod' }, roster)).toBeNull();
  });
});

describe('ModeratorChainer', () => {
  const moderator = moderatorResponder('mod', 'Moderator');
  const roster = [dataScientist, pythonExpert, moderator];

  it('starts exactly one run for the selected responder', async () => {
    const launch = vi.fn().mockResolvedValue('R2');
    const chainer = new ModeratorChainer(launch);

    const runId = await chainer.maybeChain(
      'T1',
      'room-1',
      'm1',
      moderator,
      'Forward to AI mentor: **Data Scientist**. Reason is ...',
      roster
    );

    expect(runId).toBe('R2');
    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith({
      threadId: 'T1',
      roomId: 'room-1',
      sourceMessageId: 'm1',
      responderId: 'ds',
      requestedBy: 'mod',
    });
  });

  it('stops silently when the name is unknown', async () => {
    const launch = vi.fn();
    const chainer = new ModeratorChainer(launch);

    const runId = await chainer.maybeChain('T1', 'room-1', 'm1', moderator, 'Forward to AI mentor: **Chef**', roster);

    expect(runId).toBeNull();
    expect(launch).not.toHaveBeenCalled();
  });

  it('refuses to chain a moderator to itself', async () => {
    const launch = vi.fn();
    const chainer = new ModeratorChainer(launch);

    const runId = await chainer.maybeChain('T1', 'room-1', 'm1', moderator, 'Forward to AI mentor: **Moderator**', roster);

    expect(runId).toBeNull();
    expect(launch).not.toHaveBeenCalled();
  });

  it('decodes with the moderator selection format', async () => {
    const launch = vi.fn().mockResolvedValue('R3');
    const chainer = new ModeratorChainer(launch);
    const structured = moderatorResponder('mod', 'Moderator', 'structured');

    const runId = await chainer.maybeChain('T1', 'room-1', 'm1', structured, '{"responder_id": "py"}', roster);

    expect(runId).toBe('R3');
    expect(launch).toHaveBeenCalledWith(expect.objectContaining({ responderId: 'py' }));
  });
});
