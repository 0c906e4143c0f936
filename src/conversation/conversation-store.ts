import type { RequesterId } from '../types/media.types.js';
import { type ConversationState, IDLE } from './conversation-state.js';

/**
 * In-memory conversation state per requester
 *
 * A requester without an entry is idle. Handlers for the same requester run
 * one after another through `withLock`; different requesters never wait on
 * each other.
 */
export class ConversationStore {
  private readonly states = new Map<RequesterId, ConversationState>();
  private readonly locks = new Map<RequesterId, Promise<void>>();

  get(requesterId: RequesterId): ConversationState {
    return this.states.get(requesterId) ?? IDLE;
  }

  set(requesterId: RequesterId, state: ConversationState): void {
    if (state.kind === 'idle') {
      this.states.delete(requesterId);
      return;
    }
    this.states.set(requesterId, state);
  }

  /**
   * Number of requesters with a job in flight
   */
  processingCount(): number {
    let count = 0;
    for (const state of this.states.values()) {
      if (state.kind === 'processing') count++;
    }
    return count;
  }

  /**
   * Run `fn` after every earlier call for the same requester has settled
   */
  async withLock<T>(requesterId: RequesterId, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(requesterId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The chain only orders calls; failures reach the caller through `run`
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(requesterId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(requesterId) === tail) {
        this.locks.delete(requesterId);
      }
    }
  }
}
