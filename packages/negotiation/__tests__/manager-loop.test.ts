import { describe, it, expect, vi } from 'vitest';
import { NegotiationStates as S } from '@covenant/engine-core';
import { cancelCommand, declineCommand } from '../src/commands/types.js';
import type { DispatchResult } from '../src/dispatch/types.js';
import { ConsumerNegotiationManager } from '../src/manager/consumer.js';
import { RetryTracker } from '../src/manager/retry.js';
import { InMemoryNegotiationStore } from '../src/store/in-memory.js';
import { NOW, makeConfig, makeDispatcher, makeNegotiation, manualClock, silentLogger } from './fixtures.js';

function setup(dispatch?: DispatchResult) {
  const clock = manualClock();
  const store = new InMemoryNegotiationStore({ clock: clock.now });
  const { dispatcher, send } = makeDispatcher(dispatch);
  const manager = new ConsumerNegotiationManager({
    store,
    dispatcher,
    config: makeConfig('CONSUMER', { sendRetryLimit: 3, sendRetryBaseDelayMs: 1000 }),
    logger: silentLogger,
    clock: clock.now,
    generateId: () => 'holder',
  });
  return { clock, store, send, manager };
}

describe('NegotiationManager — dispatch failures', () => {
  it('leaves the record untouched on a transient failure and backs off', async () => {
    const { manager, store, send, clock } = setup({ ok: false, fatal: false, detail: 'service unavailable' });
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();
    expect(await store.findById('neg-1')).toEqual(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();
    expect(send).toHaveBeenCalledTimes(1);

    clock.advance(1000);
    await manager.runOnce();
    expect(send).toHaveBeenCalledTimes(2);
    expect((await store.findById('neg-1'))?.stateCount).toBe(1);
  });

  it('moves to ERROR once the retry limit is exhausted', async () => {
    const { manager, store, send, clock } = setup({ ok: false, fatal: false, detail: 'service unavailable' });
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();
    clock.advance(1000);
    await manager.runOnce();
    clock.advance(2000);
    await manager.runOnce();

    expect(send).toHaveBeenCalledTimes(3);
    const stored = await store.findById('neg-1');
    expect(stored?.state).toBe(S.ERROR);
    expect(stored?.stateCount).toBe(2);
    expect(stored?.errorDetail).toBe('dispatch failed after 3 attempts: service unavailable');
  });

  it('moves to ERROR immediately on a fatal failure', async () => {
    const { manager, store } = setup({ ok: false, fatal: true, detail: 'rejected with 400' });
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();

    const stored = await store.findById('neg-1');
    expect(stored?.state).toBe(S.ERROR);
    expect(stored?.stateCount).toBe(2);
    expect(stored?.errorDetail).toBe('rejected with 400');
  });

  it('moves past records still backing off to newer work in the same state', async () => {
    const clock = manualClock();
    const store = new InMemoryNegotiationStore({ clock: clock.now });
    const { dispatcher, send } = makeDispatcher();
    send.mockImplementation(async (message) =>
      message.processId === 'old' ? { ok: false, fatal: false, detail: 'service unavailable' } : { ok: true },
    );
    const manager = new ConsumerNegotiationManager({
      store,
      dispatcher,
      config: makeConfig('CONSUMER', { batchSize: 1, sendRetryLimit: 3, sendRetryBaseDelayMs: 1000 }),
      logger: silentLogger,
      clock: clock.now,
      generateId: () => 'holder',
    });
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING, { id: 'old', correlationId: 'old', stateTimestamp: NOW - 1000 }));
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING, { id: 'new', correlationId: 'new' }));

    await manager.runOnce();
    await manager.runOnce();

    expect((await store.findById('new'))?.state).toBe(S.REQUESTED);
    expect((await store.findById('old'))?.state).toBe(S.REQUESTING);

    clock.advance(1000);
    await manager.runOnce();
    expect(send.mock.calls.map(([message]) => message.processId)).toEqual(['old', 'new', 'old']);
  });

  it('forgets failed attempts once an inbound message moves the record on', async () => {
    const clock = manualClock();
    const store = new InMemoryNegotiationStore({ clock: clock.now });
    const { dispatcher } = makeDispatcher({ ok: false, fatal: false, detail: 'service unavailable' });
    const retries = new RetryTracker({ limit: 3, baseDelayMs: 1000, maxDelayMs: 60_000 });
    const manager = new ConsumerNegotiationManager({
      store,
      dispatcher,
      config: makeConfig('CONSUMER'),
      logger: silentLogger,
      clock: clock.now,
      generateId: () => 'holder',
      retries,
    });
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();
    expect(retries.attemptsFor('neg-1', 1)).toBe(1);

    const result = await manager.declined({ claims: {} }, 'neg-1', 'withdrawn');

    expect(result.success && result.data.state).toBe(S.TERMINATED);
    expect(retries.size).toBe(0);
  });

  it('treats a dispatcher that throws as a transient failure', async () => {
    const { manager, store, send } = setup();
    send.mockRejectedValue(new Error('connect ECONNREFUSED'));
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    await manager.runOnce();

    const stored = await store.findById('neg-1');
    expect(stored?.state).toBe(S.REQUESTING);
    expect(stored?.stateCount).toBe(1);
  });
});

describe('NegotiationManager — commands', () => {
  it('keeps a command queued while another holder leases the negotiation', async () => {
    const { manager, store, send } = setup();
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));
    await store.leaseById('neg-1', 'other-worker');

    manager.enqueueCommand(cancelCommand('neg-1'));
    expect(await manager.runOnce()).toBe(0);
    expect(manager.pendingCommandFor('neg-1')).toBe('CANCEL');

    await store.releaseLease('neg-1', 'other-worker');
    expect(await manager.runOnce()).toBe(1);

    const stored = await store.findById('neg-1');
    expect(stored?.state).toBe(S.CANCELLED);
    expect(stored?.errorDetail).toBe('cancelled');
    expect(manager.pendingCommandFor('neg-1')).toBeNull();
    expect(send).not.toHaveBeenCalled();
  });

  it('drops a command whose guard no longer holds', async () => {
    const { manager, store } = setup();
    await store.save(makeNegotiation('CONSUMER', S.TERMINATED));

    manager.enqueueCommand(cancelCommand('neg-1'));
    await manager.runOnce();

    expect(manager.pendingCommandFor('neg-1')).toBeNull();
    expect((await store.findById('neg-1'))?.stateCount).toBe(1);
  });

  it('drops a command for a missing negotiation', async () => {
    const { manager } = setup();
    manager.enqueueCommand(cancelCommand('missing'));
    expect(await manager.runOnce()).toBe(0);
    expect(manager.pendingCommandFor('missing')).toBeNull();
  });

  it('declines by terminating and notifying the counter-party', async () => {
    const { manager, store, send } = setup();
    await store.save(makeNegotiation('CONSUMER', S.REQUESTED));

    manager.enqueueCommand(declineCommand('neg-1', 'price too high'));
    await manager.runOnce();

    expect(send).toHaveBeenCalledWith({
      type: 'ContractNegotiationTerminationMessage',
      protocol: 'negotiation-http',
      counterPartyAddress: 'http://provider',
      processId: 'neg-1',
      reason: 'price too high',
    });
    const stored = await store.findById('neg-1');
    expect(stored?.state).toBe(S.TERMINATED);
    expect(stored?.stateCount).toBe(3);
  });
});

describe('NegotiationManager — lifecycle', () => {
  it('processes work in the background until stopped', async () => {
    const { manager, store, send } = setup();
    await store.save(makeNegotiation('CONSUMER', S.REQUESTING));

    manager.start();
    await vi.waitFor(async () => {
      expect((await store.findById('neg-1'))?.state).toBe(S.REQUESTED);
    });
    await manager.stop();

    expect(send).toHaveBeenCalledTimes(1);
  });
});
