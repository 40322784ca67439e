import { z } from "zod";

/** A single permission / prohibition / duty. Carried, never evaluated. */
export const policyRuleSchema = z.object({
  action: z.string(),
  target: z.string().optional(),
  constraints: z.array(z.unknown()).default([]),
});

export const policySchema = z.object({
  type: z.enum(["SET", "OFFER", "CONTRACT"]).default("SET"),
  assigner: z.string().optional(),
  assignee: z.string().optional(),
  target: z.string().optional(),
  inheritsFrom: z.string().optional(),
  permissions: z.array(policyRuleSchema).default([]),
  prohibitions: z.array(policyRuleSchema).default([]),
  obligations: z.array(policyRuleSchema).default([]),
  extensibleProperties: z.record(z.unknown()).default({}),
});

export const contractOfferSchema = z.object({
  id: z.string().min(1),
  policy: policySchema,
  assetId: z.string().min(1),
  contractStart: z.number().int(),
  contractEnd: z.number().int(),
});

export const contractAgreementSchema = z.object({
  id: z.string().min(1),
  providerAgentId: z.string().min(1),
  consumerAgentId: z.string().min(1),
  assetId: z.string().min(1),
  policy: policySchema,
  contractSigningDate: z.number().int(),
  contractStartDate: z.number().int(),
  contractEndDate: z.number().int(),
});

export const NEGOTIATION_TYPES = ["CONSUMER", "PROVIDER"] as const;
export const COMMAND_TYPES = ["CANCEL", "DECLINE"] as const;

/**
 * Full negotiation record. This schema is also the field tree that query
 * filter paths are resolved against.
 */
export const contractNegotiationSchema = z.object({
  id: z.string().min(1),
  correlationId: z.string().min(1),
  type: z.enum(NEGOTIATION_TYPES),
  counterPartyId: z.string().min(1),
  counterPartyAddress: z.string().min(1),
  protocol: z.string().min(1),
  state: z.number().int(),
  stateCount: z.number().int().positive(),
  stateTimestamp: z.number().int(),
  contractOffers: z.array(contractOfferSchema),
  contractAgreement: contractAgreementSchema.nullable(),
  errorDetail: z.string().nullable(),
  pendingCommand: z.enum(COMMAND_TYPES).nullable(),
  createdAt: z.number().int(),
  updatedAt: z.number().int(),
});

export type PolicyRule = z.infer<typeof policyRuleSchema>;
export type Policy = z.infer<typeof policySchema>;
export type ContractOffer = z.infer<typeof contractOfferSchema>;
export type ContractAgreement = z.infer<typeof contractAgreementSchema>;
export type ContractNegotiation = z.infer<typeof contractNegotiationSchema>;
export type NegotiationType = (typeof NEGOTIATION_TYPES)[number];
export type NegotiationCommandType = (typeof COMMAND_TYPES)[number];

/** Input to a consumer-side initiation. */
export interface ContractOfferRequest {
  counterPartyId: string;
  counterPartyAddress: string;
  protocol: string;
  contractOffer: ContractOffer;
}

/** Verified claims of the caller of an inbound protocol message. */
export interface ClaimToken {
  claims: Record<string, unknown>;
}
