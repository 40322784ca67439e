import { z } from "zod";
import { contractAgreementSchema, contractOfferSchema, policySchema } from "@covenant/shared";

// ─── Negotiation Protocol Messages ───────────────────────────
// Every message carries `processId`: the consumer's negotiation id, which both
// sides store as their correlation id.

const baseMessageSchema = z.object({
  protocol: z.string().min(1),
  counterPartyAddress: z.string().min(1),
  processId: z.string().min(1),
});

/** Consumer → provider: initial request or counter-request. */
export const contractRequestMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractRequestMessage"),
  consumerId: z.string().min(1),
  callbackAddress: z.string().min(1),
  contractOffer: contractOfferSchema,
});

/** Provider → consumer: counter-offer. */
export const contractOfferMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractOfferMessage"),
  contractOffer: contractOfferSchema,
});

/** Provider → consumer: the agreement plus the policy it was made under. */
export const contractAgreementMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractAgreementMessage"),
  contractAgreement: contractAgreementSchema,
  policy: policySchema,
});

/** Consumer → provider: agreement verified. */
export const contractAgreementVerificationMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractAgreementVerificationMessage"),
});

export const NEGOTIATION_EVENT_TYPES = ["ACCEPTED", "FINALIZED"] as const;

/** Either side: ACCEPTED (consumer → provider) or FINALIZED (provider → consumer). */
export const contractNegotiationEventMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractNegotiationEventMessage"),
  eventType: z.enum(NEGOTIATION_EVENT_TYPES),
});

/** Either side: negotiation declined or terminated. */
export const contractNegotiationTerminationMessageSchema = baseMessageSchema.extend({
  type: z.literal("ContractNegotiationTerminationMessage"),
  reason: z.string().optional(),
});

export const protocolMessageSchema = z.discriminatedUnion("type", [
  contractRequestMessageSchema,
  contractOfferMessageSchema,
  contractAgreementMessageSchema,
  contractAgreementVerificationMessageSchema,
  contractNegotiationEventMessageSchema,
  contractNegotiationTerminationMessageSchema,
]);

export type ContractRequestMessage = z.infer<typeof contractRequestMessageSchema>;
export type ContractOfferMessage = z.infer<typeof contractOfferMessageSchema>;
export type ContractAgreementMessage = z.infer<typeof contractAgreementMessageSchema>;
export type ContractAgreementVerificationMessage = z.infer<
  typeof contractAgreementVerificationMessageSchema
>;
export type ContractNegotiationEventMessage = z.infer<typeof contractNegotiationEventMessageSchema>;
export type ContractNegotiationTerminationMessage = z.infer<
  typeof contractNegotiationTerminationMessageSchema
>;
export type NegotiationEventType = (typeof NEGOTIATION_EVENT_TYPES)[number];

export type ProtocolMessage = z.infer<typeof protocolMessageSchema>;
export type ProtocolMessageType = ProtocolMessage["type"];
