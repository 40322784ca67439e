import Fastify from "fastify";
import { ZodError } from "zod";
import type { ContractNegotiationService } from "@covenant/negotiation";
import { sendError } from "./errors.js";
import { registerManagementRoutes } from "./routes/management.js";
import { registerProtocolRoutes } from "./routes/protocol.js";

export interface ServerOptions {
  service: ContractNegotiationService;
  logLevel?: string;
}

export async function createServer({ service, logLevel }: ServerOptions) {
  const app = Fastify({
    logger: {
      level: logLevel || process.env.LOG_LEVEL || "info",
    },
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return sendError(reply, 400, "BAD_REQUEST", "Invalid request", error.flatten());
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return sendError(reply, error.statusCode, error.code, error.message);
    }
    request.log.error({ err: error }, "request failed");
    return sendError(reply, 500, "INTERNAL", "Internal server error");
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Routes ──────────────────────────────────────────────
  registerManagementRoutes(app, service);
  registerProtocolRoutes(app, service);

  return app;
}
