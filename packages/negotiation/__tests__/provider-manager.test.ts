import { describe, it, expect } from 'vitest';
import { NegotiationStates as S, type NegotiationDecider } from '@covenant/engine-core';
import type { ContractRequestMessage } from '@covenant/protocol';
import { querySpec, type ClaimToken } from '@covenant/shared';
import { ProviderNegotiationManager } from '../src/manager/provider.js';
import { InMemoryNegotiationStore } from '../src/store/in-memory.js';
import {
  NOW,
  makeConfig,
  makeDispatcher,
  makeNegotiation,
  makeOffer,
  makePolicy,
  silentLogger,
} from './fixtures.js';

const consumerToken: ClaimToken = { claims: { participantId: 'consumer-agent' } };

function setup(decider?: NegotiationDecider) {
  const store = new InMemoryNegotiationStore({ clock: () => NOW });
  const { dispatcher, send } = makeDispatcher();
  const manager = new ProviderNegotiationManager({
    store,
    dispatcher,
    config: makeConfig('PROVIDER'),
    logger: silentLogger,
    decider,
    clock: () => NOW,
    generateId: () => 'p-1',
  });
  return { store, send, manager };
}

function makeRequestMessage(offerId = 'offer-1'): ContractRequestMessage {
  return {
    type: 'ContractRequestMessage',
    protocol: 'negotiation-http',
    counterPartyAddress: 'http://provider',
    processId: 'c-1',
    consumerId: 'consumer-agent',
    callbackAddress: 'http://consumer',
    contractOffer: makeOffer(offerId),
  };
}

function providerRecord(state: number) {
  return makeNegotiation('PROVIDER', state, { id: 'p-1', correlationId: 'c-1' });
}

describe('ProviderNegotiationManager — consumerRequested', () => {
  it('creates a CONSUMER_REQUESTED negotiation for a new process id', async () => {
    const { manager } = setup();
    const result = await manager.consumerRequested(consumerToken, makeRequestMessage());
    expect(result).toEqual({ success: true, data: providerRecord(S.CONSUMER_REQUESTED) });
  });

  it('falls back to the consumer id from the message when the token names nobody', async () => {
    const { manager } = setup();
    const result = await manager.consumerRequested(
      { claims: {} },
      { ...makeRequestMessage(), consumerId: 'consumer-from-body' },
    );
    expect(result.success && result.data.counterPartyId).toBe('consumer-from-body');
  });

  it('treats a re-delivered request as a no-op', async () => {
    const { manager, store } = setup();
    await manager.consumerRequested(consumerToken, makeRequestMessage());
    const again = await manager.consumerRequested(consumerToken, makeRequestMessage());

    expect(again).toEqual({ success: true, data: providerRecord(S.CONSUMER_REQUESTED) });
    expect(await store.queryNegotiations(querySpec())).toHaveLength(1);
  });

  it('applies a counter-request to an offered negotiation', async () => {
    const { manager, store } = setup();
    await store.save(providerRecord(S.OFFERED));

    await manager.consumerRequested(consumerToken, makeRequestMessage('offer-2'));

    const stored = await store.findById('p-1');
    expect(stored?.state).toBe(S.CONSUMER_REQUESTED);
    expect(stored?.stateCount).toBe(2);
    expect(stored?.contractOffers.map((o) => o.id)).toEqual(['offer-1', 'offer-2']);
  });

  it('rejects a counter-request from a different participant', async () => {
    const { manager, store } = setup();
    await store.save(providerRecord(S.OFFERED));

    const result = await manager.consumerRequested(
      { claims: { participantId: 'intruder' } },
      makeRequestMessage('offer-2'),
    );

    expect(result).toEqual({
      success: false,
      error: { reason: 'UNAUTHORIZED', message: 'intruder is not the counter-party of negotiation p-1' },
    });
  });
});

describe('ProviderNegotiationManager — inbound', () => {
  it('moves an offered negotiation to ACCEPTED', async () => {
    const { manager, store } = setup();
    await store.save(providerRecord(S.OFFERED));

    await manager.consumerAccepted(consumerToken, 'c-1');

    expect((await store.findById('p-1'))?.state).toBe(S.ACCEPTED);
  });

  it('moves an agreed negotiation to VERIFIED', async () => {
    const { manager, store } = setup();
    await store.save(providerRecord(S.AGREED));

    await manager.verified(consumerToken, 'c-1');

    expect((await store.findById('p-1'))?.state).toBe(S.VERIFIED);
  });

  it('refuses to act on a negotiation of the other role', async () => {
    const { manager, store } = setup();
    await store.save(makeNegotiation('CONSUMER', S.AGREED, { correlationId: 'c-1' }));

    const result = await manager.verified({ claims: {} }, 'c-1');

    expect(result).toEqual({
      success: false,
      error: { reason: 'CONFLICT', message: 'negotiation neg-1 is CONSUMER, not PROVIDER' },
    });
  });
});

describe('ProviderNegotiationManager — loop', () => {
  it('agrees to a request and sends the agreement in one pass', async () => {
    const { manager, store, send } = setup();
    await store.save(providerRecord(S.CONSUMER_REQUESTED));

    expect(await manager.runOnce()).toBe(2);

    const agreement = {
      id: 'p-1',
      providerAgentId: 'provider-agent',
      consumerAgentId: 'consumer-agent',
      assetId: 'asset-1',
      policy: makePolicy({ type: 'CONTRACT' }),
      contractSigningDate: NOW,
      contractStartDate: 1000,
      contractEndDate: 2000,
    };
    expect(send).toHaveBeenCalledWith({
      type: 'ContractAgreementMessage',
      protocol: 'negotiation-http',
      counterPartyAddress: 'http://consumer',
      processId: 'c-1',
      contractAgreement: agreement,
      policy: agreement.policy,
    });
    const stored = await store.findById('p-1');
    expect(stored?.state).toBe(S.AGREED);
    expect(stored?.stateCount).toBe(3);
    expect(stored?.contractAgreement).toEqual(agreement);
  });

  it('sends a counter-offer when the decider counters', async () => {
    const { manager, store, send } = setup(() => ({ action: 'COUNTER', offer: makeOffer('offer-2') }));
    await store.save(providerRecord(S.CONSUMER_REQUESTED));

    await manager.runOnce();

    expect(send).toHaveBeenCalledWith({
      type: 'ContractOfferMessage',
      protocol: 'negotiation-http',
      counterPartyAddress: 'http://consumer',
      processId: 'c-1',
      contractOffer: makeOffer('offer-2'),
    });
    expect((await store.findById('p-1'))?.state).toBe(S.OFFERED);
  });

  it('terminates with the reason when the decider declines', async () => {
    const { manager, store, send } = setup(() => ({ action: 'DECLINE', reason: 'asset unavailable' }));
    await store.save(providerRecord(S.CONSUMER_REQUESTED));

    await manager.runOnce();

    expect(send).toHaveBeenCalledWith({
      type: 'ContractNegotiationTerminationMessage',
      protocol: 'negotiation-http',
      counterPartyAddress: 'http://consumer',
      processId: 'c-1',
      reason: 'asset unavailable',
    });
    const stored = await store.findById('p-1');
    expect(stored?.state).toBe(S.TERMINATED);
    expect(stored?.errorDetail).toBe('asset unavailable');
  });
});
