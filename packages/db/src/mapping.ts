import type { ContractAgreement, ContractNegotiation } from "@covenant/shared";
import { contractAgreements, contractNegotiations } from "./schema/index.js";

export type NegotiationRow = typeof contractNegotiations.$inferSelect;
export type NewNegotiationRow = typeof contractNegotiations.$inferInsert;
export type AgreementRow = typeof contractAgreements.$inferSelect;

export function toAgreement(row: AgreementRow): ContractAgreement {
  return {
    id: row.id,
    providerAgentId: row.providerAgentId,
    consumerAgentId: row.consumerAgentId,
    assetId: row.assetId,
    policy: row.policy,
    contractSigningDate: row.contractSigningDate,
    contractStartDate: row.contractStartDate,
    contractEndDate: row.contractEndDate,
  };
}

export function toAgreementRow(agreement: ContractAgreement): AgreementRow {
  return { ...agreement };
}

/** Rebuild the domain record. Pending commands are never stored. */
export function toNegotiation(row: NegotiationRow, agreement: AgreementRow | null): ContractNegotiation {
  return {
    id: row.id,
    correlationId: row.correlationId,
    type: row.type,
    counterPartyId: row.counterPartyId,
    counterPartyAddress: row.counterPartyAddress,
    protocol: row.protocol,
    state: row.state,
    stateCount: row.stateCount,
    stateTimestamp: row.stateTimestamp,
    contractOffers: row.contractOffers,
    contractAgreement: agreement ? toAgreement(agreement) : null,
    errorDetail: row.errorDetail,
    pendingCommand: null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Columns written on every save. A save always drops the lease. */
export function toNegotiationRow(negotiation: ContractNegotiation): NewNegotiationRow {
  return {
    id: negotiation.id,
    correlationId: negotiation.correlationId,
    type: negotiation.type,
    counterPartyId: negotiation.counterPartyId,
    counterPartyAddress: negotiation.counterPartyAddress,
    protocol: negotiation.protocol,
    state: negotiation.state,
    stateCount: negotiation.stateCount,
    stateTimestamp: negotiation.stateTimestamp,
    contractOffers: negotiation.contractOffers,
    contractAgreementId: negotiation.contractAgreement?.id ?? null,
    errorDetail: negotiation.errorDetail,
    leaseHolder: null,
    leaseExpiresAt: null,
    createdAt: negotiation.createdAt,
    updatedAt: negotiation.updatedAt,
  };
}
