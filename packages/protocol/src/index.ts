// ─── Negotiation Protocol ────────────────────────────────────
// Typed messages exchanged between consumer and provider agents, with zod
// schemas for decoding inbound JSON bodies.

export {
  contractRequestMessageSchema,
  contractOfferMessageSchema,
  contractAgreementMessageSchema,
  contractAgreementVerificationMessageSchema,
  contractNegotiationEventMessageSchema,
  contractNegotiationTerminationMessageSchema,
  protocolMessageSchema,
  NEGOTIATION_EVENT_TYPES,
} from "./types.js";
export type {
  ContractRequestMessage,
  ContractOfferMessage,
  ContractAgreementMessage,
  ContractAgreementVerificationMessage,
  ContractNegotiationEventMessage,
  ContractNegotiationTerminationMessage,
  NegotiationEventType,
  ProtocolMessage,
  ProtocolMessageType,
} from "./types.js";

export { PROTOCOL_BASE_PATH, MESSAGE_ROUTES, messageUrl } from "./routes.js";
