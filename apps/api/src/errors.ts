import type { FastifyReply } from "fastify";
import type { FailureReason, ServiceResult } from "@covenant/shared";

export const STATUS_BY_REASON: Record<FailureReason, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 403,
  FATAL: 500,
};

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.status(status).send({ success: false, error: { code, message, details } });
}

/** Write a service result in the response envelope. */
export function sendResult<T>(reply: FastifyReply, result: ServiceResult<T>, successStatus = 200) {
  if (!result.success) {
    return sendError(reply, STATUS_BY_REASON[result.error.reason], result.error.reason, result.error.message);
  }
  return reply.status(successStatus).send({ success: true, data: result.data });
}
