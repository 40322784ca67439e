/**
 * Negotiation state codes. Numeric order follows negotiation progress, so
 * "before AGREED" is a plain comparison.
 */
export const NegotiationStates = {
  ERROR: -1,
  INITIAL: 50,
  REQUESTING: 100,
  REQUESTED: 200,
  CONSUMER_REQUESTED: 250,
  OFFERING: 300,
  OFFERED: 400,
  ACCEPTING: 700,
  ACCEPTED: 800,
  AGREEING: 825,
  AGREED: 850,
  VERIFYING: 1050,
  VERIFIED: 1100,
  FINALIZING: 1150,
  FINALIZED: 1200,
  TERMINATING: 1300,
  TERMINATED: 1400,
  CANCELLED: 1500,
} as const;

export type NegotiationStateName = keyof typeof NegotiationStates;
export type NegotiationStateCode = (typeof NegotiationStates)[NegotiationStateName];

/** Terminal states that do not accept any further transitions. */
const TERMINAL_STATES: ReadonlySet<number> = new Set([
  NegotiationStates.FINALIZED,
  NegotiationStates.TERMINATED,
  NegotiationStates.CANCELLED,
  NegotiationStates.ERROR,
]);

function isStateName(value: string): value is NegotiationStateName {
  return value in NegotiationStates;
}

export const STATE_NAMES: readonly NegotiationStateName[] = Object.keys(NegotiationStates).filter(isStateName);

const NAMES_BY_CODE: ReadonlyMap<number, NegotiationStateName> = new Map(
  STATE_NAMES.map((name): [number, NegotiationStateName] => [NegotiationStates[name], name]),
);

/** Symbolic name of a state code, or null for an unknown code. */
export function stateName(code: number): NegotiationStateName | null {
  return NAMES_BY_CODE.get(code) ?? null;
}

export function isTerminal(state: number): boolean {
  return TERMINAL_STATES.has(state);
}

export function isBeforeAgreed(state: number): boolean {
  return state < NegotiationStates.AGREED;
}
