import { isCancellable, isTerminal, stateName, validateQuerySpec } from '@covenant/engine-core';
import type {
  ContractAgreementMessage,
  ContractAgreementVerificationMessage,
  ContractNegotiationEventMessage,
  ContractNegotiationTerminationMessage,
  ContractOfferMessage,
  ContractRequestMessage,
  ProtocolMessage,
} from '@covenant/protocol';
import {
  failure,
  success,
  type ClaimToken,
  type ContractAgreement,
  type ContractNegotiation,
  type ContractOfferRequest,
  type QuerySpec,
  type ServiceResult,
} from '@covenant/shared';
import { cancelCommand, declineCommand } from '../commands/types.js';
import type { ConsumerNegotiationManager } from '../manager/consumer.js';
import type { NegotiationManager } from '../manager/manager.js';
import type { ProviderNegotiationManager } from '../manager/provider.js';
import type { ContractNegotiationStore } from '../store/types.js';
import { NoopTransactionContext, type TransactionContext } from '../transaction.js';

const DEFAULT_DECLINE_REASON = 'declined';

/**
 * Entry point for management and protocol callers. Reads go straight to the
 * store; every write is handed to the manager that owns the negotiation.
 */
export class ContractNegotiationService {
  constructor(
    private readonly store: ContractNegotiationStore,
    private readonly consumerManager: ConsumerNegotiationManager,
    private readonly providerManager: ProviderNegotiationManager,
    private readonly transactionContext: TransactionContext = new NoopTransactionContext(),
  ) {}

  // ─── Reads ─────────────────────────────────────────────────

  findById(id: string): Promise<ContractNegotiation | null> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findById(id);
      return negotiation ? this.withPendingCommand(negotiation) : null;
    });
  }

  query(spec: QuerySpec): Promise<ServiceResult<ContractNegotiation[]>> {
    return this.transactionContext.execute(async () => {
      const invalid = validateQuerySpec(spec);
      if (invalid) return failure(invalid.reason, invalid.message);
      const negotiations = await this.store.queryNegotiations(spec);
      return success(negotiations.map((n) => this.withPendingCommand(n)));
    });
  }

  getState(id: string): Promise<string | null> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findById(id);
      return negotiation ? stateName(negotiation.state) : null;
    });
  }

  getForNegotiation(negotiationId: string): Promise<ContractAgreement | null> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findById(negotiationId);
      return negotiation?.contractAgreement ?? null;
    });
  }

  findAgreement(agreementId: string): Promise<ContractAgreement | null> {
    return this.transactionContext.execute(() => this.store.findContractAgreement(agreementId));
  }

  // ─── Management ────────────────────────────────────────────

  initiateNegotiation(request: ContractOfferRequest): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() => this.consumerManager.initiate(request));
  }

  /** Queue a cancellation. The returned record is the state before the command applies. */
  cancel(id: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findById(id);
      if (!negotiation) return failure('NOT_FOUND', `negotiation ${id} not found`);
      if (!isCancellable(negotiation)) {
        return failure('CONFLICT', `negotiation ${id} cannot be cancelled in state ${stateName(negotiation.state)}`);
      }
      this.consumerManager.enqueueCommand(cancelCommand(id));
      return success(this.withPendingCommand(negotiation));
    });
  }

  /** Queue a decline on whichever side owns the record. */
  decline(id: string, reason?: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findById(id);
      if (!negotiation) return failure('NOT_FOUND', `negotiation ${id} not found`);
      if (isTerminal(negotiation.state)) {
        return failure('CONFLICT', `negotiation ${id} is already ${stateName(negotiation.state)}`);
      }
      this.managerFor(negotiation).enqueueCommand(declineCommand(id, reason ?? DEFAULT_DECLINE_REASON));
      return success(this.withPendingCommand(negotiation));
    });
  }

  // ─── Protocol notifications ────────────────────────────────

  notifyConsumerRequested(
    message: ContractRequestMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() => this.providerManager.consumerRequested(token, message));
  }

  notifyProviderOffered(message: ContractOfferMessage, token: ClaimToken): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() =>
      this.consumerManager.providerOffered(token, message.processId, message.contractOffer),
    );
  }

  notifyConsumerAccepted(
    message: ContractNegotiationEventMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() => this.providerManager.consumerAccepted(token, message.processId));
  }

  notifyProviderAgreed(
    message: ContractAgreementMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() =>
      this.consumerManager.providerAgreed(token, message.processId, message.contractAgreement, message.policy),
    );
  }

  notifyConsumerVerified(
    message: ContractAgreementVerificationMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() => this.providerManager.verified(token, message.processId));
  }

  notifyProviderFinalized(
    message: ContractNegotiationEventMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(() => this.consumerManager.finalized(token, message.processId));
  }

  /** Either side may terminate; the stored record decides which manager applies it. */
  notifyTerminated(
    message: ContractNegotiationTerminationMessage,
    token: ClaimToken,
  ): Promise<ServiceResult<ContractNegotiation>> {
    return this.transactionContext.execute(async () => {
      const negotiation = await this.store.findForCorrelationId(message.processId);
      if (!negotiation) return failure('NOT_FOUND', `no negotiation for correlation id ${message.processId}`);
      return this.managerFor(negotiation).declined(token, message.processId, message.reason);
    });
  }

  /** Route any inbound protocol message to its notification. */
  receive(message: ProtocolMessage, token: ClaimToken): Promise<ServiceResult<ContractNegotiation>> {
    switch (message.type) {
      case 'ContractRequestMessage':
        return this.notifyConsumerRequested(message, token);
      case 'ContractOfferMessage':
        return this.notifyProviderOffered(message, token);
      case 'ContractAgreementMessage':
        return this.notifyProviderAgreed(message, token);
      case 'ContractAgreementVerificationMessage':
        return this.notifyConsumerVerified(message, token);
      case 'ContractNegotiationEventMessage':
        return message.eventType === 'ACCEPTED'
          ? this.notifyConsumerAccepted(message, token)
          : this.notifyProviderFinalized(message, token);
      case 'ContractNegotiationTerminationMessage':
        return this.notifyTerminated(message, token);
    }
  }

  // ─── Helpers ───────────────────────────────────────────────

  private managerFor(negotiation: ContractNegotiation): NegotiationManager {
    return negotiation.type === 'CONSUMER' ? this.consumerManager : this.providerManager;
  }

  private withPendingCommand(negotiation: ContractNegotiation): ContractNegotiation {
    const pendingCommand = this.managerFor(negotiation).pendingCommandFor(negotiation.id);
    return { ...negotiation, pendingCommand };
  }
}
