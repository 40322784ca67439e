// ─── Domain Types ────────────────────────────────────────────
export {
  policyRuleSchema,
  policySchema,
  contractOfferSchema,
  contractAgreementSchema,
  contractNegotiationSchema,
  NEGOTIATION_TYPES,
  COMMAND_TYPES,
} from "./types/negotiation.js";
export type {
  PolicyRule,
  Policy,
  ContractOffer,
  ContractAgreement,
  ContractNegotiation,
  NegotiationType,
  NegotiationCommandType,
  ContractOfferRequest,
  ClaimToken,
} from "./types/negotiation.js";

// ─── Results ─────────────────────────────────────────────────
export type { FailureReason, ServiceFailure, ServiceResult } from "./types/result.js";
export { success, failure } from "./utils/result.js";

// ─── Queries ─────────────────────────────────────────────────
export { QUERY_OPERATORS, criterionSchema, querySpecSchema } from "./types/query.js";
export type { QueryOperator, Criterion, QuerySpec } from "./types/query.js";
export { querySpec, criterion, parseCriterion } from "./utils/query.js";
