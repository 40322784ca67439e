import "dotenv/config";
import {
  ConsumerNegotiationManager,
  ContractNegotiationService,
  DEFAULT_MANAGER_CONFIG,
  InMemoryNegotiationStore,
  NoopTransactionContext,
  ProviderNegotiationManager,
  createLogger,
  type ContractNegotiationStore,
  type ManagerConfig,
  type TransactionContext,
} from "@covenant/negotiation";
import { DrizzleNegotiationStore, DrizzleTransactionContext, createDb } from "@covenant/db";
import { loadConfig, type AppConfig } from "./config.js";
import { HttpMessageDispatcher } from "./dispatch/http-dispatcher.js";
import { createServer } from "./server.js";

function createStore(config: AppConfig): { store: ContractNegotiationStore; transactions: TransactionContext } {
  if (!config.DATABASE_URL) {
    return {
      store: new InMemoryNegotiationStore({ leaseDurationMs: config.NEGOTIATION_LEASE_MS }),
      transactions: new NoopTransactionContext(),
    };
  }
  const db = createDb(config.DATABASE_URL);
  const transactions = new DrizzleTransactionContext(db);
  return {
    store: new DrizzleNegotiationStore(db, { leaseDurationMs: config.NEGOTIATION_LEASE_MS, transactions }),
    transactions,
  };
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ name: "negotiation", level: config.LOG_LEVEL });

  const { store, transactions } = createStore(config);
  const managerConfig: ManagerConfig = {
    ...DEFAULT_MANAGER_CONFIG,
    participantId: config.PARTICIPANT_ID,
    callbackAddress: config.PROTOCOL_ADDRESS,
    batchSize: config.NEGOTIATION_BATCH_SIZE,
    iterationWaitMs: config.NEGOTIATION_ITERATION_WAIT_MS,
    sendRetryLimit: config.NEGOTIATION_SEND_RETRY_LIMIT,
    sendRetryBaseDelayMs: config.NEGOTIATION_SEND_RETRY_BASE_DELAY_MS,
  };
  const dispatcher = new HttpMessageDispatcher(config.PARTICIPANT_ID);
  const deps = { store, dispatcher, config: managerConfig };
  const consumer = new ConsumerNegotiationManager({ ...deps, logger: logger.child({ role: "consumer" }) });
  const provider = new ProviderNegotiationManager({ ...deps, logger: logger.child({ role: "provider" }) });
  const service = new ContractNegotiationService(store, consumer, provider, transactions);

  const server = await createServer({ service, logLevel: config.LOG_LEVEL });

  consumer.start();
  provider.start();
  await server.listen({ port: config.PORT, host: config.HOST });
  server.log.info(`Negotiation agent ${config.PARTICIPANT_ID} running on ${config.HOST}:${config.PORT}`);
  server.log.info(`Store: ${config.DATABASE_URL ? "postgres" : "in-memory"}`);

  const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, shutting down`);
    await Promise.all([consumer.stop(), provider.stop()]);
    await server.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        server.log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
