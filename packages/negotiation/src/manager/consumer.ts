import { NegotiationStates } from '@covenant/engine-core';
import type {
  ClaimToken,
  ContractAgreement,
  ContractNegotiation,
  ContractOffer,
  ContractOfferRequest,
  Policy,
  ServiceResult,
} from '@covenant/shared';
import { NegotiationManager, type ManagerDependencies } from './manager.js';

/** Drives negotiations this agent started as the consumer. */
export class ConsumerNegotiationManager extends NegotiationManager {
  constructor(deps: ManagerDependencies) {
    super('CONSUMER', deps);
  }

  /**
   * Start a negotiation. The record is created in REQUESTING and is due
   * immediately, so the next pass sends the request. Its own id doubles as the
   * correlation id the provider will echo back.
   */
  initiate(request: ContractOfferRequest): Promise<ServiceResult<ContractNegotiation>> {
    const id = this.generateId();
    const now = this.clock();
    return this.create({
      id,
      correlationId: id,
      type: 'CONSUMER',
      counterPartyId: request.counterPartyId,
      counterPartyAddress: request.counterPartyAddress,
      protocol: request.protocol,
      state: NegotiationStates.REQUESTING,
      stateCount: 1,
      stateTimestamp: now,
      contractOffers: [request.contractOffer],
      contractAgreement: null,
      errorDetail: null,
      pendingCommand: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  /** The provider answered with a counter-offer. */
  providerOffered(token: ClaimToken, correlationId: string, offer: ContractOffer): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'OFFERED', offer });
  }

  /** The provider agreed; the policy sent alongside the agreement is the one recorded. */
  providerAgreed(
    token: ClaimToken,
    correlationId: string,
    agreement: ContractAgreement,
    policy: Policy,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'AGREED', agreement: { ...agreement, policy } });
  }

  finalized(token: ClaimToken, correlationId: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'FINALIZED' });
  }
}
