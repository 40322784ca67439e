import { NegotiationStates } from '@covenant/engine-core';
import type { ContractRequestMessage } from '@covenant/protocol';
import type { ClaimToken, ContractNegotiation, ServiceResult } from '@covenant/shared';
import { NegotiationManager, type ManagerDependencies } from './manager.js';

/** Drives negotiations a consumer opened with this agent. */
export class ProviderNegotiationManager extends NegotiationManager {
  constructor(deps: ManagerDependencies) {
    super('PROVIDER', deps);
  }

  /**
   * A consumer sent a request. The first request for a process id creates the
   * provider's record; a later one is a counter-request on the existing record.
   */
  async consumerRequested(
    token: ClaimToken,
    message: ContractRequestMessage,
  ): Promise<ServiceResult<ContractNegotiation>> {
    const existing = await this.store.findForCorrelationId(message.processId);
    if (existing) {
      return this.applyInbound(token, existing, { type: 'REQUESTED', offer: message.contractOffer });
    }

    const participant = token.claims.participantId;
    const now = this.clock();
    return this.create({
      id: this.generateId(),
      correlationId: message.processId,
      type: 'PROVIDER',
      counterPartyId: typeof participant === 'string' ? participant : message.consumerId,
      counterPartyAddress: message.callbackAddress,
      protocol: message.protocol,
      state: NegotiationStates.CONSUMER_REQUESTED,
      stateCount: 1,
      stateTimestamp: now,
      contractOffers: [message.contractOffer],
      contractAgreement: null,
      errorDetail: null,
      pendingCommand: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  /** The consumer accepted the provider's counter-offer. */
  consumerAccepted(token: ClaimToken, correlationId: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'ACCEPTED' });
  }

  verified(token: ClaimToken, correlationId: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'VERIFIED' });
  }
}
