import { vi } from 'vitest';
import type { ContractNegotiation, ContractOffer, NegotiationType, Policy } from '@covenant/shared';
import { createLogger } from '../src/logger.js';
import type { ManagerConfig } from '../src/manager/config.js';
import type { DispatchResult, MessageDispatcher } from '../src/dispatch/types.js';

export const NOW = 1_700_000_000_000;

export const silentLogger = createLogger({ level: 'silent' });

export function makePolicy(overrides: Partial<Policy> = {}): Policy {
  return {
    type: 'OFFER',
    assigner: 'provider-agent',
    permissions: [{ action: 'use', constraints: [] }],
    prohibitions: [],
    obligations: [],
    extensibleProperties: {},
    ...overrides,
  };
}

export function makeOffer(id = 'offer-1', assetId = 'asset-1'): ContractOffer {
  return { id, policy: makePolicy(), assetId, contractStart: 1000, contractEnd: 2000 };
}

export function makeNegotiation(
  type: NegotiationType,
  state: number,
  overrides: Partial<ContractNegotiation> = {},
): ContractNegotiation {
  return {
    id: 'neg-1',
    correlationId: 'neg-1',
    type,
    counterPartyId: type === 'CONSUMER' ? 'provider-agent' : 'consumer-agent',
    counterPartyAddress: type === 'CONSUMER' ? 'http://provider' : 'http://consumer',
    protocol: 'negotiation-http',
    state,
    stateCount: 1,
    stateTimestamp: NOW,
    contractOffers: [makeOffer()],
    contractAgreement: null,
    errorDetail: null,
    pendingCommand: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function makeConfig(role: NegotiationType, overrides: Partial<ManagerConfig> = {}): ManagerConfig {
  return {
    participantId: role === 'CONSUMER' ? 'consumer-agent' : 'provider-agent',
    callbackAddress: role === 'CONSUMER' ? 'http://consumer' : 'http://provider',
    batchSize: 5,
    iterationWaitMs: 10,
    sendRetryLimit: 3,
    sendRetryBaseDelayMs: 1000,
    sendRetryMaxDelayMs: 60_000,
    ...overrides,
  };
}

export function makeDispatcher(result: DispatchResult = { ok: true }) {
  const send = vi.fn<MessageDispatcher['send']>().mockResolvedValue(result);
  const dispatcher: MessageDispatcher = { send };
  return { dispatcher, send };
}

/** A clock the test moves by hand. */
export function manualClock(start = NOW) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}
