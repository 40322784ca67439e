import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  failure,
  success,
  type ClaimToken,
  type ContractNegotiation,
  type NegotiationCommandType,
  type NegotiationType,
  type ServiceResult,
} from '@covenant/shared';
import {
  NegotiationStates,
  stateName,
  transition,
  type NegotiationDecider,
  type NegotiationEvent,
  type TransitionContext,
  type TransitionResult,
} from '@covenant/engine-core';
import type { ProtocolMessage } from '@covenant/protocol';
import { CommandQueue } from '../commands/queue.js';
import type { ContractNegotiationCommand } from '../commands/types.js';
import type { DispatchResult, MessageDispatcher } from '../dispatch/types.js';
import type { Logger } from '../logger.js';
import type { ContractNegotiationStore } from '../store/types.js';
import type { ManagerConfig } from './config.js';
import { RetryTracker } from './retry.js';

const S = NegotiationStates;

/** States each role's loop picks up. Everything else waits for the counter-party. */
const PROCESSED_STATES: Record<NegotiationType, readonly number[]> = {
  CONSUMER: [S.INITIAL, S.REQUESTING, S.OFFERED, S.ACCEPTING, S.AGREED, S.VERIFYING, S.TERMINATING],
  PROVIDER: [S.CONSUMER_REQUESTED, S.OFFERING, S.ACCEPTED, S.AGREEING, S.VERIFIED, S.FINALIZING, S.TERMINATING],
};

export interface ManagerDependencies {
  store: ContractNegotiationStore;
  dispatcher: MessageDispatcher;
  config: ManagerConfig;
  logger: Logger;
  /** Evaluates the latest offer when it is this side's turn. Agrees by default. */
  decider?: NegotiationDecider;
  clock?: () => number;
  generateId?: () => string;
  /** Failed send attempts. Built from the config's retry settings when absent. */
  retries?: RetryTracker;
}

/** What happened when a transition's side effects were executed. */
type Execution =
  | { status: 'saved'; negotiation: ContractNegotiation }
  | { status: 'unchanged' }
  | { status: 'dispatch-failed'; fatal: boolean; detail: string }
  | { status: 'save-failed'; reason: 'NOT_FOUND' | 'CONFLICT'; message: string };

const agreeToEverything: NegotiationDecider = () => ({ action: 'AGREE' });

/**
 * The only writer of negotiation state. One instance per role: it runs the
 * leasing loop for the states its role drives, applies queued commands, and
 * applies inbound notifications. Subclasses add the role's inbound operations.
 */
export abstract class NegotiationManager {
  readonly role: NegotiationType;

  protected readonly store: ContractNegotiationStore;
  protected readonly logger: Logger;
  protected readonly clock: () => number;
  protected readonly generateId: () => string;

  private readonly dispatcher: MessageDispatcher;
  private readonly config: ManagerConfig;
  private readonly decider: NegotiationDecider;
  private readonly commands = new CommandQueue();
  private readonly retries: RetryTracker;
  private readonly holder: string;

  private running = false;
  private loop: Promise<void> | null = null;
  private wake: AbortController | null = null;

  protected constructor(role: NegotiationType, deps: ManagerDependencies) {
    this.role = role;
    this.store = deps.store;
    this.dispatcher = deps.dispatcher;
    this.config = deps.config;
    this.logger = deps.logger;
    this.decider = deps.decider ?? agreeToEverything;
    this.clock = deps.clock ?? Date.now;
    this.generateId = deps.generateId ?? randomUUID;
    this.retries =
      deps.retries ??
      new RetryTracker({
        limit: deps.config.sendRetryLimit,
        baseDelayMs: deps.config.sendRetryBaseDelayMs,
        maxDelayMs: deps.config.sendRetryMaxDelayMs,
      });
    this.holder = `${role.toLowerCase()}-${this.generateId()}`;
  }

  // ─── Lifecycle ─────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
    this.logger.info({ role: this.role, holder: this.holder }, 'negotiation manager started');
  }

  async stop(): Promise<void> {
    this.running = false;
    this.wake?.abort();
    await this.loop;
    this.loop = null;
    this.logger.info({ role: this.role }, 'negotiation manager stopped');
  }

  /**
   * One pass: apply queued commands, then lease and process a batch for each
   * state this role drives. Returns how many negotiations were acted on.
   */
  async runOnce(): Promise<number> {
    let processed = await this.applyCommands();
    for (const state of PROCESSED_STATES[this.role]) {
      const leased = await this.leaseDue(state);
      const outcomes = await Promise.all(leased.map((n) => this.processSafely(n)));
      processed += outcomes.filter(Boolean).length;
    }
    return processed;
  }

  // ─── Commands ──────────────────────────────────────────────

  enqueueCommand(command: ContractNegotiationCommand): void {
    this.commands.enqueue(command);
    this.nudge();
  }

  pendingCommandFor(negotiationId: string): NegotiationCommandType | null {
    return this.commands.pendingFor(negotiationId)?.type ?? null;
  }

  // ─── Inbound ───────────────────────────────────────────────

  /** The counter-party declined or terminated the negotiation. */
  declined(token: ClaimToken, correlationId: string, reason?: string): Promise<ServiceResult<ContractNegotiation>> {
    return this.handleInbound(token, correlationId, { type: 'TERMINATED', reason: reason ?? null });
  }

  protected async handleInbound(
    token: ClaimToken,
    correlationId: string,
    event: NegotiationEvent,
  ): Promise<ServiceResult<ContractNegotiation>> {
    const negotiation = await this.store.findForCorrelationId(correlationId);
    if (!negotiation) {
      return failure('NOT_FOUND', `no negotiation for correlation id ${correlationId}`);
    }
    return this.applyInbound(token, negotiation, event);
  }

  protected async applyInbound(
    token: ClaimToken,
    negotiation: ContractNegotiation,
    event: NegotiationEvent,
  ): Promise<ServiceResult<ContractNegotiation>> {
    const participant = token.claims.participantId;
    if (typeof participant === 'string' && participant !== negotiation.counterPartyId) {
      return failure('UNAUTHORIZED', `${participant} is not the counter-party of negotiation ${negotiation.id}`);
    }

    const result = transition(negotiation, event, this.context());
    if (!result.ok) return failure(result.reason, result.message);

    const execution = await this.execute(negotiation, result);
    switch (execution.status) {
      case 'saved':
        this.retries.clear(negotiation.id);
        this.nudge();
        return success(execution.negotiation);
      case 'unchanged':
        return success(negotiation);
      case 'save-failed':
        return failure(execution.reason, execution.message);
      case 'dispatch-failed':
        return failure('FATAL', execution.detail);
    }
  }

  /** Persist a negotiation this manager just created. */
  protected async create(negotiation: ContractNegotiation): Promise<ServiceResult<ContractNegotiation>> {
    const saved = await this.store.save(negotiation);
    if (!saved.ok) return failure(saved.reason, saved.message);
    this.logger.info(
      { negotiationId: negotiation.id, role: this.role, state: stateName(negotiation.state) },
      'negotiation created',
    );
    this.nudge();
    return success(saved.value);
  }

  // ─── Loop internals ────────────────────────────────────────

  private async run(): Promise<void> {
    while (this.running) {
      let processed = 0;
      try {
        processed = await this.runOnce();
      } catch (err) {
        this.logger.error({ err, role: this.role }, 'negotiation pass failed');
      }
      if (processed === 0 && this.running) await this.pause();
    }
  }

  private async pause(): Promise<void> {
    const controller = new AbortController();
    this.wake = controller;
    try {
      await sleep(this.config.iterationWaitMs, undefined, { signal: controller.signal });
    } catch (err) {
      if (!controller.signal.aborted) throw err;
    } finally {
      this.wake = null;
    }
  }

  /** Cut the current pause short so new work is picked up promptly. */
  private nudge(): void {
    this.wake?.abort();
  }

  /**
   * Lease up to a batch of records in `state` whose retry is due. Records still
   * backing off stay leased while the search moves past them, then are released,
   * so they never take the place of newer work.
   */
  private async leaseDue(state: number): Promise<ContractNegotiation[]> {
    const now = this.clock();
    const due: ContractNegotiation[] = [];
    const waiting: string[] = [];
    while (due.length < this.config.batchSize) {
      const batchSize = this.config.batchSize - due.length;
      const leased = await this.store.leaseNextByState(state, { type: this.role, batchSize, holder: this.holder });
      for (const negotiation of leased) {
        if (this.retries.isDue(negotiation.id, negotiation.stateCount, now)) {
          due.push(negotiation);
        } else {
          waiting.push(negotiation.id);
        }
      }
      if (leased.length < batchSize) break;
    }
    await Promise.all(waiting.map((id) => this.store.releaseLease(id, this.holder)));
    return due;
  }

  private async applyCommands(): Promise<number> {
    const deferred: ContractNegotiationCommand[] = [];
    let applied = 0;
    for (const command of this.commands.drain()) {
      const claim = await this.store.leaseById(command.negotiationId, this.holder);
      if (!claim.ok) {
        if (claim.reason === 'CONFLICT') {
          deferred.push(command);
        } else {
          this.logger.warn({ command, reason: claim.message }, 'dropping command');
        }
        continue;
      }

      const negotiation = claim.value;
      const result = transition(negotiation, commandEvent(command), this.context());
      if (!result.ok) {
        this.logger.warn({ command, reason: result.message }, 'dropping command');
        await this.store.releaseLease(negotiation.id, this.holder);
        continue;
      }
      const execution = await this.execute(negotiation, result);
      if (execution.status === 'saved') {
        this.retries.clear(negotiation.id);
        applied++;
      } else {
        if (execution.status === 'save-failed') {
          this.logger.warn({ command, reason: execution.message }, 'dropping command');
        }
        await this.store.releaseLease(negotiation.id, this.holder);
      }
    }
    this.commands.requeue(deferred);
    return applied;
  }

  private async processSafely(negotiation: ContractNegotiation): Promise<boolean> {
    try {
      return await this.process(negotiation);
    } catch (err) {
      this.logger.error({ err, negotiationId: negotiation.id, role: this.role }, 'processing negotiation failed');
      await this.store.releaseLease(negotiation.id, this.holder);
      return false;
    }
  }

  private async process(negotiation: ContractNegotiation): Promise<boolean> {
    const now = this.clock();
    const result = transition(negotiation, { type: 'PROCESS' }, this.context(now));
    if (!result.ok) return this.fail(negotiation, result.message);

    const execution = await this.execute(negotiation, result);
    switch (execution.status) {
      case 'saved':
        this.retries.clear(negotiation.id);
        return true;
      case 'unchanged':
        await this.store.releaseLease(negotiation.id, this.holder);
        return false;
      case 'save-failed':
        this.logger.debug(
          { negotiationId: negotiation.id, reason: execution.message },
          'lost the race to persist negotiation',
        );
        await this.store.releaseLease(negotiation.id, this.holder);
        return false;
      case 'dispatch-failed':
        if (execution.fatal) return this.fail(negotiation, execution.detail);
        return this.retry(negotiation, execution.detail, now);
    }
  }

  private async retry(negotiation: ContractNegotiation, detail: string, now: number): Promise<boolean> {
    const { id, stateCount } = negotiation;
    if (!this.retries.recordFailure(id, stateCount, now)) {
      const attempts = this.retries.attemptsFor(id, stateCount);
      return this.fail(negotiation, `dispatch failed after ${attempts} attempts: ${detail}`);
    }
    this.logger.warn(
      { negotiationId: id, state: stateName(negotiation.state), attempt: this.retries.attemptsFor(id, stateCount), detail },
      'dispatch failed, will retry',
    );
    await this.store.releaseLease(id, this.holder);
    return true;
  }

  private async fail(negotiation: ContractNegotiation, detail: string): Promise<boolean> {
    this.retries.clear(negotiation.id);
    const result = transition(negotiation, { type: 'FAILED', detail }, this.context());
    if (!result.ok) {
      this.logger.error({ negotiationId: negotiation.id, reason: result.message }, 'cannot move negotiation to ERROR');
      await this.store.releaseLease(negotiation.id, this.holder);
      return false;
    }
    const execution = await this.execute(negotiation, result);
    if (execution.status !== 'saved') {
      await this.store.releaseLease(negotiation.id, this.holder);
      return false;
    }
    this.logger.error({ negotiationId: negotiation.id, role: this.role, detail }, 'negotiation failed');
    return true;
  }

  /** Run the side effects of a successful transition in order. */
  private async execute(
    original: ContractNegotiation,
    result: Extract<TransitionResult, { ok: true }>,
  ): Promise<Execution> {
    let execution: Execution = { status: 'unchanged' };
    for (const effect of result.effects) {
      if (effect.kind === 'SEND') {
        const outcome = await this.dispatch(effect.message);
        if (!outcome.ok) return { status: 'dispatch-failed', fatal: outcome.fatal, detail: outcome.detail };
        continue;
      }
      const saved = await this.store.save(result.negotiation);
      if (!saved.ok) return { status: 'save-failed', reason: saved.reason, message: saved.message };
      this.logger.info(
        {
          negotiationId: original.id,
          role: this.role,
          from: stateName(original.state),
          to: stateName(saved.value.state),
          stateCount: saved.value.stateCount,
        },
        'negotiation transitioned',
      );
      execution = { status: 'saved', negotiation: saved.value };
    }
    return execution;
  }

  private async dispatch(message: ProtocolMessage): Promise<DispatchResult> {
    try {
      return await this.dispatcher.send(message);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { ok: false, fatal: false, detail };
    }
  }

  private context(now: number = this.clock()): TransitionContext {
    return {
      role: this.role,
      now,
      participantId: this.config.participantId,
      callbackAddress: this.config.callbackAddress,
      generateId: this.generateId,
      decide: this.decider,
    };
  }
}

function commandEvent(command: ContractNegotiationCommand): NegotiationEvent {
  switch (command.type) {
    case 'CANCEL':
      return { type: 'CANCEL' };
    case 'DECLINE':
      return { type: 'DECLINE', reason: command.reason };
  }
}
