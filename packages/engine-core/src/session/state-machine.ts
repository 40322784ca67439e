import type { ContractAgreement, ContractNegotiation, ContractOffer } from '@covenant/shared';
import type { ProtocolMessage } from '@covenant/protocol';
import { NegotiationStates, isBeforeAgreed, isTerminal, stateName } from './states.js';
import type { NegotiationEvent, TransitionContext, TransitionResult } from './types.js';

const S = NegotiationStates;

const DEFAULT_TERMINATION_REASON = 'terminated by counter-party';

/**
 * Apply an event to a negotiation. Returns the next record (stateCount bumped
 * when the state changed) and the side effects the manager must execute, or a
 * failure when the event is not legal for the record's role and state.
 *
 * Re-delivery of an inbound event that already took effect is a no-op success
 * with no effects.
 */
export function transition(
  negotiation: ContractNegotiation,
  event: NegotiationEvent,
  ctx: TransitionContext,
): TransitionResult {
  if (negotiation.type !== ctx.role) {
    return conflict(`negotiation ${negotiation.id} is ${negotiation.type}, not ${ctx.role}`);
  }

  switch (event.type) {
    case 'PROCESS':
      return ctx.role === 'CONSUMER' ? processConsumer(negotiation, ctx) : processProvider(negotiation, ctx);
    case 'REQUESTED':
      return onRequested(negotiation, event.offer, ctx);
    case 'OFFERED':
      return onOffered(negotiation, event.offer, ctx);
    case 'ACCEPTED':
      return onAccepted(negotiation, ctx);
    case 'AGREED':
      return onAgreed(negotiation, event.agreement, ctx);
    case 'VERIFIED':
      return onVerified(negotiation, ctx);
    case 'FINALIZED':
      return onFinalized(negotiation, ctx);
    case 'TERMINATED':
      return onTerminated(negotiation, event.reason, ctx);
    case 'CANCEL':
      return onCancel(negotiation, ctx);
    case 'DECLINE':
      return onDecline(negotiation, event.reason, ctx);
    case 'FAILED':
      if (isTerminal(negotiation.state)) return illegal(negotiation, event.type);
      return moved(advance(negotiation, S.ERROR, ctx, { errorDetail: event.detail }));
  }
}

/** A consumer may cancel only before the agreement exists. */
export function isCancellable(negotiation: ContractNegotiation): boolean {
  return (
    negotiation.type === 'CONSUMER' &&
    !isTerminal(negotiation.state) &&
    isBeforeAgreed(negotiation.state)
  );
}

// ─── Loop steps ──────────────────────────────────────────────

function processConsumer(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  switch (n.state) {
    case S.INITIAL:
      return moved(advance(n, S.REQUESTING, ctx));
    case S.REQUESTING: {
      const offer = lastOffer(n);
      if (!offer) return conflict(`negotiation ${n.id} has no offer to request`);
      return moved(advance(n, S.REQUESTED, ctx), {
        type: 'ContractRequestMessage',
        ...envelope(n),
        consumerId: ctx.participantId,
        callbackAddress: ctx.callbackAddress,
        contractOffer: offer,
      });
    }
    case S.OFFERED:
      return applyDecision(n, ctx, S.ACCEPTING, S.REQUESTING);
    case S.ACCEPTING:
      return moved(advance(n, S.ACCEPTED, ctx), {
        type: 'ContractNegotiationEventMessage',
        ...envelope(n),
        eventType: 'ACCEPTED',
      });
    case S.AGREED:
      return moved(advance(n, S.VERIFYING, ctx));
    case S.VERIFYING:
      return moved(advance(n, S.VERIFIED, ctx), {
        type: 'ContractAgreementVerificationMessage',
        ...envelope(n),
      });
    case S.TERMINATING:
      return terminate(n, ctx);
    default:
      return illegal(n, 'PROCESS');
  }
}

function processProvider(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  switch (n.state) {
    case S.CONSUMER_REQUESTED:
      return applyDecision(n, ctx, S.AGREEING, S.OFFERING);
    case S.OFFERING: {
      const offer = lastOffer(n);
      if (!offer) return conflict(`negotiation ${n.id} has no offer to send`);
      return moved(advance(n, S.OFFERED, ctx), {
        type: 'ContractOfferMessage',
        ...envelope(n),
        contractOffer: offer,
      });
    }
    case S.ACCEPTED:
      return moved(advance(n, S.AGREEING, ctx));
    case S.AGREEING: {
      const offer = lastOffer(n);
      if (!offer) return conflict(`negotiation ${n.id} has no offer to agree on`);
      const agreement = createAgreement(n, offer, ctx);
      return moved(advance(n, S.AGREED, ctx, { contractAgreement: agreement }), {
        type: 'ContractAgreementMessage',
        ...envelope(n),
        contractAgreement: agreement,
        policy: agreement.policy,
      });
    }
    case S.VERIFIED:
      return moved(advance(n, S.FINALIZING, ctx));
    case S.FINALIZING:
      return moved(advance(n, S.FINALIZED, ctx), {
        type: 'ContractNegotiationEventMessage',
        ...envelope(n),
        eventType: 'FINALIZED',
      });
    case S.TERMINATING:
      return terminate(n, ctx);
    default:
      return illegal(n, 'PROCESS');
  }
}

function applyDecision(
  n: ContractNegotiation,
  ctx: TransitionContext,
  agreeState: number,
  counterState: number,
): TransitionResult {
  const decision = ctx.decide(n);
  switch (decision.action) {
    case 'AGREE':
      return moved(advance(n, agreeState, ctx));
    case 'COUNTER':
      return moved(advance(n, counterState, ctx, { contractOffers: [...n.contractOffers, decision.offer] }));
    case 'DECLINE':
      return moved(advance(n, S.TERMINATING, ctx, { errorDetail: decision.reason }));
  }
}

function terminate(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  return moved(advance(n, S.TERMINATED, ctx), {
    type: 'ContractNegotiationTerminationMessage',
    ...envelope(n),
    reason: n.errorDetail ?? undefined,
  });
}

// ─── Inbound notifications ───────────────────────────────────
// Each also accepts the sender-side "-ING" state: the counter-party may answer
// before this side has persisted the state it moves to after sending.

function onRequested(n: ContractNegotiation, offer: ContractOffer, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'PROVIDER') return illegal(n, 'REQUESTED');
  if (n.state === S.CONSUMER_REQUESTED && lastOffer(n)?.id === offer.id) return unchanged(n);
  if (n.state !== S.OFFERED && n.state !== S.OFFERING) return illegal(n, 'REQUESTED');
  return moved(advance(n, S.CONSUMER_REQUESTED, ctx, { contractOffers: [...n.contractOffers, offer] }));
}

function onOffered(n: ContractNegotiation, offer: ContractOffer, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'CONSUMER') return illegal(n, 'OFFERED');
  if (n.state === S.OFFERED && lastOffer(n)?.id === offer.id) return unchanged(n);
  if (n.state !== S.REQUESTED && n.state !== S.REQUESTING) return illegal(n, 'OFFERED');
  return moved(advance(n, S.OFFERED, ctx, { contractOffers: [...n.contractOffers, offer] }));
}

function onAccepted(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'PROVIDER') return illegal(n, 'ACCEPTED');
  if (n.state === S.ACCEPTED) return unchanged(n);
  if (n.state !== S.OFFERED && n.state !== S.OFFERING) return illegal(n, 'ACCEPTED');
  return moved(advance(n, S.ACCEPTED, ctx));
}

function onAgreed(n: ContractNegotiation, agreement: ContractAgreement, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'CONSUMER') return illegal(n, 'AGREED');
  if (n.state === S.AGREED && n.contractAgreement?.id === agreement.id) return unchanged(n);
  const from: readonly number[] = [S.REQUESTING, S.REQUESTED, S.ACCEPTING, S.ACCEPTED];
  if (!from.includes(n.state)) return illegal(n, 'AGREED');
  return moved(advance(n, S.AGREED, ctx, { contractAgreement: agreement }));
}

function onVerified(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'PROVIDER') return illegal(n, 'VERIFIED');
  if (n.state === S.VERIFIED) return unchanged(n);
  if (n.state !== S.AGREED) return illegal(n, 'VERIFIED');
  return moved(advance(n, S.VERIFIED, ctx));
}

function onFinalized(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  if (ctx.role !== 'CONSUMER') return illegal(n, 'FINALIZED');
  if (n.state === S.FINALIZED) return unchanged(n);
  if (n.state !== S.VERIFIED && n.state !== S.VERIFYING) return illegal(n, 'FINALIZED');
  return moved(advance(n, S.FINALIZED, ctx));
}

function onTerminated(n: ContractNegotiation, reason: string | null, ctx: TransitionContext): TransitionResult {
  if (n.state === S.TERMINATED) return unchanged(n);
  if (isTerminal(n.state)) return illegal(n, 'TERMINATED');
  return moved(advance(n, S.TERMINATED, ctx, { errorDetail: reason ?? DEFAULT_TERMINATION_REASON }));
}

// ─── Commands ────────────────────────────────────────────────

function onCancel(n: ContractNegotiation, ctx: TransitionContext): TransitionResult {
  if (!isCancellable(n)) {
    return conflict(`negotiation ${n.id} cannot be cancelled in state ${describe(n.state)}`);
  }
  return moved(advance(n, S.CANCELLED, ctx, { errorDetail: 'cancelled' }));
}

function onDecline(n: ContractNegotiation, reason: string, ctx: TransitionContext): TransitionResult {
  if (n.state === S.TERMINATING) return unchanged(n);
  if (isTerminal(n.state)) return illegal(n, 'DECLINE');
  return moved(advance(n, S.TERMINATING, ctx, { errorDetail: reason }));
}

// ─── Helpers ─────────────────────────────────────────────────

function advance(
  n: ContractNegotiation,
  state: number,
  ctx: TransitionContext,
  patch: Partial<ContractNegotiation> = {},
): ContractNegotiation {
  return {
    ...n,
    ...patch,
    state,
    stateCount: n.stateCount + 1,
    stateTimestamp: ctx.now,
    updatedAt: ctx.now,
    pendingCommand: null,
  };
}

function moved(next: ContractNegotiation, message?: ProtocolMessage): TransitionResult {
  return {
    ok: true,
    negotiation: next,
    effects: message ? [{ kind: 'SEND', message }, { kind: 'SAVE' }] : [{ kind: 'SAVE' }],
  };
}

function unchanged(n: ContractNegotiation): TransitionResult {
  return { ok: true, negotiation: n, effects: [] };
}

function conflict(message: string): TransitionResult {
  return { ok: false, reason: 'CONFLICT', message };
}

function illegal(n: ContractNegotiation, event: string): TransitionResult {
  return conflict(`${event} is not allowed for ${n.type} negotiation ${n.id} in state ${describe(n.state)}`);
}

function describe(state: number): string {
  return stateName(state) ?? String(state);
}

function envelope(n: ContractNegotiation) {
  return {
    protocol: n.protocol,
    counterPartyAddress: n.counterPartyAddress,
    processId: n.correlationId,
  };
}

function lastOffer(n: ContractNegotiation): ContractOffer | undefined {
  return n.contractOffers[n.contractOffers.length - 1];
}

function createAgreement(
  n: ContractNegotiation,
  offer: ContractOffer,
  ctx: TransitionContext,
): ContractAgreement {
  return {
    id: ctx.generateId(),
    providerAgentId: ctx.participantId,
    consumerAgentId: n.counterPartyId,
    assetId: offer.assetId,
    policy: { ...offer.policy, type: 'CONTRACT' },
    contractSigningDate: ctx.now,
    contractStartDate: offer.contractStart,
    contractEndDate: offer.contractEnd,
  };
}
