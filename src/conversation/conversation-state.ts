import type { Profile } from '../types/media.types.js';

/**
 * Where one requester stands in the conversation
 */
export type ConversationState =
  | { kind: 'idle' }
  | { kind: 'awaitingUrl'; profile: Profile }
  | { kind: 'awaitingSearchQuery' }
  | { kind: 'processing'; since: number };

export const IDLE: ConversationState = { kind: 'idle' };

export const awaitingUrl = (profile: Profile): ConversationState => ({ kind: 'awaitingUrl', profile });

export const AWAITING_SEARCH_QUERY: ConversationState = { kind: 'awaitingSearchQuery' };

export const processing = (since = Date.now()): ConversationState => ({ kind: 'processing', since });
