import type { FastifyInstance, FastifyRequest } from "fastify";
import type { ContractNegotiationService } from "@covenant/negotiation";
import { stateName } from "@covenant/engine-core";
import {
  MESSAGE_ROUTES,
  PROTOCOL_BASE_PATH,
  protocolMessageSchema,
  type ProtocolMessageType,
} from "@covenant/protocol";
import type { ClaimToken } from "@covenant/shared";
import { PARTICIPANT_HEADER } from "../dispatch/http-dispatcher.js";
import { sendError, sendResult } from "../errors.js";

/**
 * Claims of the calling agent. Verifying the caller is left to whatever sits
 * in front of this service; the header is taken as given.
 */
function claimToken(request: FastifyRequest): ClaimToken {
  const participant = request.headers[PARTICIPANT_HEADER];
  return typeof participant === "string" && participant.length > 0
    ? { claims: { participantId: participant } }
    : { claims: {} };
}

function isMessageType(value: string): value is ProtocolMessageType {
  return Object.hasOwn(MESSAGE_ROUTES, value);
}

/** Inbound protocol surface: one POST route per message type. */
export function registerProtocolRoutes(app: FastifyInstance, service: ContractNegotiationService) {
  for (const type of Object.keys(MESSAGE_ROUTES).filter(isMessageType)) {
    app.post(`${PROTOCOL_BASE_PATH}${MESSAGE_ROUTES[type]}`, async (request, reply) => {
      const parsed = protocolMessageSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendError(reply, 400, "BAD_REQUEST", `Invalid ${type}`, parsed.error.flatten());
      }
      if (parsed.data.type !== type) {
        return sendError(reply, 400, "BAD_REQUEST", `Expected ${type}, got ${parsed.data.type}`);
      }

      const result = await service.receive(parsed.data, claimToken(request));
      if (!result.success) return sendResult(reply, result);
      request.log.debug({ type, processId: parsed.data.processId }, "protocol message accepted");
      return { success: true, data: { processId: parsed.data.processId, state: stateName(result.data.state) } };
    });
  }
}
