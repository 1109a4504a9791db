/**
 * Moderator Chainer
 *
 * After a moderator run completes, reads its hand-off and starts one run
 * for the selected responder. Chained runs never chain again.
 */

import {
  isModerator,
  type ModeratorResponder,
  type Responder,
  type ResponderRef,
} from '../../types/responder.js';
import { createSelectionDecoder } from './selection-decoders.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ module: 'moderator-chainer' });

export interface ChainedRunRequest {
  threadId: string;
  roomId: string;
  sourceMessageId: string;
  responderId: string;
  /** The moderator handing off; it is the participant asking for the lock */
  requestedBy: string;
}

/**
 * Starts the chained run. Resolves to its id, or null if it could not start.
 */
export type ChainLauncher = (request: ChainedRunRequest) => Promise<string | null>;

export class ModeratorChainer {
  constructor(private launch: ChainLauncher) {}

  async maybeChain(
    threadId: string,
    roomId: string,
    sourceMessageId: string,
    moderator: ModeratorResponder,
    output: string,
    roomResponders: Responder[]
  ): Promise<string | null> {
    const ref = createSelectionDecoder(moderator.selectionFormat).resolveSelection(output);
    if (!ref) {
      logger.debug({ threadId, moderatorId: moderator.id }, 'No selection in moderator output');
      return null;
    }

    const target = resolveResponder(ref, roomResponders);
    if (!target) {
      logger.info({ threadId, moderatorId: moderator.id, ref }, 'Moderator selection did not resolve');
      return null;
    }

    logger.info({ threadId, moderatorId: moderator.id, responderId: target.id }, 'Chaining to selected responder');
    return this.launch({
      threadId,
      roomId,
      sourceMessageId,
      responderId: target.id,
      requestedBy: moderator.id,
    });
  }
}

/**
 * Match a reference against the roster. Ids match exactly, names
 * case-insensitively after trimming. Moderators never match.
 */
export function resolveResponder(ref: ResponderRef, roster: Responder[]): Responder | null {
  const eligible = roster.filter((responder) => !isModerator(responder));

  if (ref.by === 'id') {
    return eligible.find((responder) => responder.id === ref.id) ?? null;
  }

  const wanted = ref.name.trim().toLowerCase();
  return eligible.find((responder) => responder.name.trim().toLowerCase() === wanted) ?? null;
}
