import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ContractNegotiationService } from "@covenant/negotiation";
import { contractOfferSchema, parseCriterion, querySpecSchema, type Criterion } from "@covenant/shared";
import { sendError, sendResult } from "../errors.js";

const idParamSchema = z.object({
  id: z.string().min(1),
});

const offerRequestSchema = z.object({
  counterPartyId: z.string().min(1),
  counterPartyAddress: z.string().min(1),
  protocol: z.string().min(1),
  contractOffer: contractOfferSchema,
});

const declineBodySchema = z
  .object({
    reason: z.string().min(1).max(500).optional(),
  })
  .default({});

const listQuerySchema = z.object({
  filter: z.union([z.string(), z.array(z.string())]).optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
  sortField: z.string().min(1).optional(),
  sortOrder: z.enum(["ASC", "DESC"]).optional(),
});

/** Parse every "path<op>value" filter, or name the first one that is not. */
function parseFilters(filter: string | string[] | undefined): Criterion[] | string {
  const expressions = filter === undefined ? [] : Array.isArray(filter) ? filter : [filter];
  const criteria: Criterion[] = [];
  for (const expression of expressions) {
    const parsed = parseCriterion(expression);
    if (!parsed) return expression;
    criteria.push(parsed);
  }
  return criteria;
}

export function registerManagementRoutes(app: FastifyInstance, service: ContractNegotiationService) {
  // ─── POST /v1/negotiations — start a negotiation as consumer ─
  app.post("/v1/negotiations", async (request, reply) => {
    const body = offerRequestSchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 400, "BAD_REQUEST", "Invalid negotiation request", body.error.flatten());
    }
    const result = await service.initiateNegotiation(body.data);
    return sendResult(reply, result, 201);
  });

  // ─── GET /v1/negotiations — query ────────────────────────
  app.get("/v1/negotiations", async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendError(reply, 400, "BAD_REQUEST", "Invalid query parameters", query.error.flatten());
    }
    const { filter, ...paging } = query.data;
    const criteria = parseFilters(filter);
    if (typeof criteria === "string") {
      return sendError(reply, 400, "BAD_REQUEST", `Invalid filter expression '${criteria}'`);
    }
    const spec = querySpecSchema.parse({ ...paging, filterExpression: criteria });
    const result = await service.query(spec);
    return sendResult(reply, result);
  });

  app.get("/v1/negotiations/:id", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const negotiation = await service.findById(params.id);
    if (!negotiation) return sendError(reply, 404, "NOT_FOUND", `Negotiation ${params.id} not found`);
    return { success: true, data: negotiation };
  });

  app.get("/v1/negotiations/:id/state", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const state = await service.getState(params.id);
    if (!state) return sendError(reply, 404, "NOT_FOUND", `Negotiation ${params.id} not found`);
    return { success: true, data: { state } };
  });

  app.get("/v1/negotiations/:id/agreement", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const agreement = await service.getForNegotiation(params.id);
    if (!agreement) return sendError(reply, 404, "NOT_FOUND", `No agreement for negotiation ${params.id}`);
    return { success: true, data: agreement };
  });

  app.get("/v1/agreements/:id", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const agreement = await service.findAgreement(params.id);
    if (!agreement) return sendError(reply, 404, "NOT_FOUND", `Agreement ${params.id} not found`);
    return { success: true, data: agreement };
  });

  // ─── Commands — applied by the owning manager on its next pass ─
  app.post("/v1/negotiations/:id/cancel", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const result = await service.cancel(params.id);
    return sendResult(reply, result);
  });

  app.post("/v1/negotiations/:id/decline", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const body = declineBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 400, "BAD_REQUEST", "Invalid decline request", body.error.flatten());
    }
    const result = await service.decline(params.id, body.data.reason);
    return sendResult(reply, result);
  });
}
