// States
export {
  NegotiationStates,
  STATE_NAMES,
  stateName,
  isTerminal,
  isBeforeAgreed,
} from './session/states.js';
export type { NegotiationStateName, NegotiationStateCode } from './session/states.js';

// Transition types + state machine
export type {
  NegotiationEvent,
  NegotiationEventType,
  SideEffect,
  Decision,
  NegotiationDecider,
  TransitionContext,
  TransitionResult,
} from './session/types.js';
export { transition, isCancellable } from './session/state-machine.js';

// Query validation
export { validateFilterPath, validateQuerySpec } from './query/filter-path.js';
