import {
  ConsumerNegotiationManager,
  ContractNegotiationService,
  InMemoryNegotiationStore,
  ProviderNegotiationManager,
  createLogger,
  type ManagerConfig,
  type MessageDispatcher,
} from "@covenant/negotiation";
import type { ContractOffer } from "@covenant/shared";
import { createServer } from "../src/server.js";

export const NOW = 1_700_000_000_000;

export function makeOffer(id = "offer-1"): ContractOffer {
  return {
    id,
    policy: {
      type: "OFFER",
      permissions: [{ action: "use", constraints: [] }],
      prohibitions: [],
      obligations: [],
      extensibleProperties: {},
    },
    assetId: "asset-1",
    contractStart: 1000,
    contractEnd: 2000,
  };
}

function managerConfig(): ManagerConfig {
  return {
    participantId: "local-agent",
    callbackAddress: "http://local",
    batchSize: 5,
    iterationWaitMs: 10,
    sendRetryLimit: 3,
    sendRetryBaseDelayMs: 1000,
    sendRetryMaxDelayMs: 60_000,
  };
}

/** A server over an in-memory store. The managers' loops are not started. */
export async function buildApp() {
  const store = new InMemoryNegotiationStore({ clock: () => NOW });
  const dispatcher: MessageDispatcher = { send: async () => ({ ok: true }) };
  const logger = createLogger({ level: "silent" });
  let ids = 0;
  const deps = { store, dispatcher, logger, clock: () => NOW, generateId: () => `id-${++ids}` };
  const consumer = new ConsumerNegotiationManager({ ...deps, config: managerConfig() });
  const provider = new ProviderNegotiationManager({ ...deps, config: managerConfig() });
  const service = new ContractNegotiationService(store, consumer, provider);
  const app = await createServer({ service, logLevel: "silent" });
  return { app, store, consumer, provider, service };
}
