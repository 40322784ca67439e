import type { ProtocolMessageType } from "./types.js";

/** Base path of the inbound negotiation protocol surface. */
export const PROTOCOL_BASE_PATH = "/protocol/negotiations";

/** Route suffix each message type is posted to, relative to PROTOCOL_BASE_PATH. */
export const MESSAGE_ROUTES: Record<ProtocolMessageType, string> = {
  ContractRequestMessage: "/request",
  ContractOfferMessage: "/offer",
  ContractAgreementMessage: "/agreement",
  ContractAgreementVerificationMessage: "/verification",
  ContractNegotiationEventMessage: "/event",
  ContractNegotiationTerminationMessage: "/termination",
};

/** Absolute URL a message is delivered to at the counter-party. */
export function messageUrl(counterPartyAddress: string, type: ProtocolMessageType): string {
  const base = counterPartyAddress.replace(/\/+$/, "");
  return `${base}${PROTOCOL_BASE_PATH}${MESSAGE_ROUTES[type]}`;
}
