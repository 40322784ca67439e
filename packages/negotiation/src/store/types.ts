import type {
  ContractAgreement,
  ContractNegotiation,
  FailureReason,
  NegotiationType,
  QuerySpec,
} from '@covenant/shared';

/** Outcome of a conditional store write or claim. */
export type StoreResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; reason: Extract<FailureReason, 'NOT_FOUND' | 'CONFLICT'>; message: string };

export interface LeaseRequest {
  type: NegotiationType;
  batchSize: number;
  /** Identifies the loop claiming the records. */
  holder: string;
}

/**
 * Durable keyed storage for negotiations.
 *
 * `save` is a compare-and-swap on `stateCount`: it succeeds only when the
 * stored version equals `negotiation.stateCount - 1`, or when the record does
 * not exist yet and `stateCount` is 1. A successful save releases any lease on
 * the record.
 */
export interface ContractNegotiationStore {
  findById(id: string): Promise<ContractNegotiation | null>;
  findForCorrelationId(correlationId: string): Promise<ContractNegotiation | null>;
  findContractAgreement(agreementId: string): Promise<ContractAgreement | null>;
  queryNegotiations(spec: QuerySpec): Promise<ContractNegotiation[]>;
  save(negotiation: ContractNegotiation): Promise<StoreResult<ContractNegotiation>>;
  /** Claim up to `batchSize` unleased records of one role in `state`, oldest first. */
  leaseNextByState(state: number, request: LeaseRequest): Promise<ContractNegotiation[]>;
  /** Claim a single record, failing with CONFLICT while another holder's lease is live. */
  leaseById(id: string, holder: string): Promise<StoreResult<ContractNegotiation>>;
  releaseLease(id: string, holder: string): Promise<void>;
}
