/** Imperative actions applied to a negotiation by its owning manager. */
export type ContractNegotiationCommand =
  | { type: 'CANCEL'; negotiationId: string }
  | { type: 'DECLINE'; negotiationId: string; reason: string };

export function cancelCommand(negotiationId: string): ContractNegotiationCommand {
  return { type: 'CANCEL', negotiationId };
}

export function declineCommand(negotiationId: string, reason: string): ContractNegotiationCommand {
  return { type: 'DECLINE', negotiationId, reason };
}
