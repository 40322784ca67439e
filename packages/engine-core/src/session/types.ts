import type {
  ContractAgreement,
  ContractNegotiation,
  ContractOffer,
  FailureReason,
  NegotiationType,
} from '@covenant/shared';
import type { ProtocolMessage } from '@covenant/protocol';

/** Events that trigger state transitions. */
export type NegotiationEvent =
  // time-driven step taken by the owning manager's loop
  | { type: 'PROCESS' }
  // inbound protocol notifications
  | { type: 'REQUESTED'; offer: ContractOffer }
  | { type: 'OFFERED'; offer: ContractOffer }
  | { type: 'ACCEPTED' }
  | { type: 'AGREED'; agreement: ContractAgreement }
  | { type: 'VERIFIED' }
  | { type: 'FINALIZED' }
  | { type: 'TERMINATED'; reason: string | null }
  // local commands
  | { type: 'CANCEL' }
  | { type: 'DECLINE'; reason: string }
  // fatal dispatch failure or retries exhausted
  | { type: 'FAILED'; detail: string };

export type NegotiationEventType = NegotiationEvent['type'];

/** Declarative work for the manager. The state machine itself never does I/O. */
export type SideEffect =
  | { kind: 'SEND'; message: ProtocolMessage }
  | { kind: 'SAVE' };

/** Outcome of evaluating the latest offer when it is this side's turn. */
export type Decision =
  | { action: 'AGREE' }
  | { action: 'COUNTER'; offer: ContractOffer }
  | { action: 'DECLINE'; reason: string };

export type NegotiationDecider = (negotiation: ContractNegotiation) => Decision;

export interface TransitionContext {
  role: NegotiationType;
  now: number;
  /** This agent's participant id. */
  participantId: string;
  /** Address the counter-party reaches this agent's protocol surface on. */
  callbackAddress: string;
  generateId: () => string;
  decide: NegotiationDecider;
}

export type TransitionResult =
  | { ok: true; negotiation: ContractNegotiation; effects: SideEffect[] }
  | { ok: false; reason: FailureReason; message: string };
