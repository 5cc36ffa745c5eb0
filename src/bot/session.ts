/**
 * Conversation state machine for the chat-bot front end
 *
 * No stored session means the user is at the main menu. A scan only starts
 * on the awaiting-confirmation -> scanning transition.
 */

import { parseDomain } from '../core/domain.js';
import type { Domain, Mode } from '../core/types.js';

export type SessionState =
  | { step: 'awaiting-domain' }
  | { step: 'awaiting-mode'; domain: Domain }
  | { step: 'awaiting-confirmation'; domain: Domain; mode: Mode }
  | { step: 'scanning'; domain: Domain; mode: Mode; controller: AbortController };

export type SessionEvent =
  | { type: 'begin' }
  | { type: 'domain'; text: string }
  | { type: 'mode'; mode: Mode }
  | { type: 'confirm'; controller: AbortController }
  | { type: 'back' }
  | { type: 'cancel' }
  | { type: 'finished' };

export type Outcome =
  | 'ask-domain'
  | 'invalid-domain'
  | 'ask-mode'
  | 'ask-confirmation'
  | 'start-scan'
  | 'menu'
  | 'cancelled'
  | 'cancelling'
  | 'nothing-to-cancel'
  | 'finished'
  | 'busy'
  | 'ignored';

export interface Transition {
  /** `null` returns the user to the main menu */
  state: SessionState | null;
  outcome: Outcome;
}

/**
 * Next state for `event`
 */
export function transition(state: SessionState | null, event: SessionEvent): Transition {
  if (state?.step === 'scanning') {
    return scanningTransition(state, event);
  }

  switch (event.type) {
    case 'begin':
      return { state: { step: 'awaiting-domain' }, outcome: 'ask-domain' };

    case 'domain':
      if (state?.step !== 'awaiting-domain') {
        return { state, outcome: 'ignored' };
      }
      try {
        return {
          state: { step: 'awaiting-mode', domain: parseDomain(event.text) },
          outcome: 'ask-mode',
        };
      } catch {
        return { state, outcome: 'invalid-domain' };
      }

    case 'mode':
      if (state?.step !== 'awaiting-mode') {
        return { state, outcome: 'ignored' };
      }
      return {
        state: { step: 'awaiting-confirmation', domain: state.domain, mode: event.mode },
        outcome: 'ask-confirmation',
      };

    case 'confirm':
      if (state?.step !== 'awaiting-confirmation') {
        return { state, outcome: 'ignored' };
      }
      return {
        state: {
          step: 'scanning',
          domain: state.domain,
          mode: state.mode,
          controller: event.controller,
        },
        outcome: 'start-scan',
      };

    case 'back':
      switch (state?.step) {
        case 'awaiting-confirmation':
          return { state: { step: 'awaiting-mode', domain: state.domain }, outcome: 'ask-mode' };
        case 'awaiting-mode':
          return { state: { step: 'awaiting-domain' }, outcome: 'ask-domain' };
        default:
          return { state: null, outcome: 'menu' };
      }

    case 'cancel':
      return state ? { state: null, outcome: 'cancelled' } : { state, outcome: 'nothing-to-cancel' };

    case 'finished':
      return { state, outcome: 'ignored' };
  }
}

/**
 * While a scan runs only cancel and finished have an effect
 */
function scanningTransition(
  state: Extract<SessionState, { step: 'scanning' }>,
  event: SessionEvent
): Transition {
  switch (event.type) {
    case 'cancel':
      return { state, outcome: state.controller.signal.aborted ? 'ignored' : 'cancelling' };
    case 'finished':
      return { state: null, outcome: 'finished' };
    default:
      return { state, outcome: 'busy' };
  }
}
