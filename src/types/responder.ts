/**
 * Responder configuration
 *
 * Responders are automated participants backed by a completion source.
 * The role is read once per run and carried as a tagged variant.
 */

/**
 * How a moderator's hand-off is decoded from its output.
 * - marker: `Forward to AI mentor: **Name**`
 * - structured: JSON object naming a responder id
 * - auto: structured first, then marker
 */
export type SelectionFormat = 'marker' | 'structured' | 'auto';

interface ResponderProfile {
  id: string;
  name: string;
  /** Behavioral instructions used as the system prompt */
  instructions: string;
  description: string | null;
  personality: string | null;
  /** Model override; the completion source default applies when null */
  model: string | null;
}

export interface StandardResponder extends ResponderProfile {
  role: 'standard';
}

export interface ModeratorResponder extends ResponderProfile {
  role: 'moderator';
  selectionFormat: SelectionFormat;
}

export type Responder = StandardResponder | ModeratorResponder;

export interface ResponderRow {
  id: string;
  name: string;
  instructions: string;
  description: string | null;
  personality: string | null;
  model: string | null;
  is_moderator: boolean;
  selection_format: string | null;
}

/**
 * A moderator's pick, before it is checked against the room roster
 */
export type ResponderRef =
  | { by: 'id'; id: string }
  | { by: 'name'; name: string };

const SELECTION_FORMATS: readonly SelectionFormat[] = ['marker', 'structured', 'auto'];

function parseSelectionFormat(value: string | null): SelectionFormat {
  const format = SELECTION_FORMATS.find((candidate) => candidate === value);
  return format ?? 'auto';
}

export function mapResponderRow(row: ResponderRow): Responder {
  const profile: ResponderProfile = {
    id: row.id,
    name: row.name,
    instructions: row.instructions,
    description: row.description,
    personality: row.personality,
    model: row.model,
  };

  if (row.is_moderator) {
    return { ...profile, role: 'moderator', selectionFormat: parseSelectionFormat(row.selection_format) };
  }
  return { ...profile, role: 'standard' };
}

export function isModerator(responder: Responder): responder is ModeratorResponder {
  return responder.role === 'moderator';
}
