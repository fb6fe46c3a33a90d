import type { NegotiationState } from './types.js';

/** Events that trigger negotiation transitions. */
export type NegotiationEvent = 'accept' | 'counter' | 'reject' | 'walk_away' | 'resume';

/** Terminal states that do not accept any transitions. */
const TERMINAL_STATES: ReadonlySet<NegotiationState> = new Set(['ACCEPTED', 'WALKED_AWAY']);

/**
 * Valid state transitions map.
 * Key: current state → Map of event → next state.
 */
const TRANSITIONS: Record<NegotiationState, Partial<Record<NegotiationEvent, NegotiationState>>> = {
  AWAITING_OFFER: {
    accept: 'ACCEPTED',
    counter: 'COUNTERED',
    reject: 'REJECTED',
    walk_away: 'WALKED_AWAY',
  },
  COUNTERED: {
    resume: 'AWAITING_OFFER',
  },
  REJECTED: {
    resume: 'AWAITING_OFFER',
  },
  ACCEPTED: {},
  WALKED_AWAY: {},
};

/**
 * Attempt a state transition. Returns the new state if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: NegotiationState, event: NegotiationEvent): NegotiationState | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  return TRANSITIONS[current][event] ?? null;
}

export function isTerminal(state: NegotiationState): boolean {
  return TERMINAL_STATES.has(state);
}
