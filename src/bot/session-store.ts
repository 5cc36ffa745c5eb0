/**
 * Per-user conversation state with idle expiry
 */

import { LRUCache } from 'lru-cache';
import { transition } from './session.js';
import type { SessionEvent, SessionState, Transition } from './session.js';

export class SessionStore {
  private cache: LRUCache<number, SessionState>;

  /**
   * @param ttl Idle time in milliseconds before a session is forgotten
   * @param maxSize Maximum number of concurrent sessions
   */
  constructor(ttl = 30 * 60 * 1000, maxSize = 1000) {
    this.cache = new LRUCache<number, SessionState>({
      max: maxSize,
      ttl,
      updateAgeOnGet: true,
      updateAgeOnHas: false,
    });
  }

  get(userId: number): SessionState | null {
    return this.cache.get(userId) ?? null;
  }

  /**
   * Feed an event through the state machine and store the result
   */
  apply(userId: number, event: SessionEvent): Transition {
    const next = transition(this.get(userId), event);

    if (next.state) {
      this.cache.set(userId, next.state);
    } else {
      this.cache.delete(userId);
    }

    return next;
  }

  delete(userId: number): void {
    this.cache.delete(userId);
  }

  /**
   * Abort every running scan, e.g. on shutdown
   */
  abortAll(): number {
    let aborted = 0;
    for (const state of this.cache.values()) {
      if (state.step === 'scanning' && !state.controller.signal.aborted) {
        state.controller.abort();
        aborted++;
      }
    }
    return aborted;
  }

  get size(): number {
    return this.cache.size;
  }
}
