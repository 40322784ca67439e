import type { ContractAgreement, ContractNegotiation, QuerySpec } from '@covenant/shared';
import { applyQuery } from './query.js';
import type { ContractNegotiationStore, LeaseRequest, StoreResult } from './types.js';

interface Lease {
  holder: string;
  expiresAt: number;
}

interface Entry {
  negotiation: ContractNegotiation;
  lease: Lease | null;
}

export interface InMemoryStoreOptions {
  leaseDurationMs?: number;
  clock?: () => number;
}

const DEFAULT_LEASE_DURATION_MS = 60_000;

/**
 * Reference implementation of the store contract. Records are copied on the
 * way in and out so callers never share state with the store.
 */
export class InMemoryNegotiationStore implements ContractNegotiationStore {
  private readonly entries = new Map<string, Entry>();
  private readonly leaseDurationMs: number;
  private readonly clock: () => number;

  constructor(options: InMemoryStoreOptions = {}) {
    this.leaseDurationMs = options.leaseDurationMs ?? DEFAULT_LEASE_DURATION_MS;
    this.clock = options.clock ?? Date.now;
  }

  async findById(id: string): Promise<ContractNegotiation | null> {
    const entry = this.entries.get(id);
    return entry ? structuredClone(entry.negotiation) : null;
  }

  async findForCorrelationId(correlationId: string): Promise<ContractNegotiation | null> {
    for (const { negotiation } of this.entries.values()) {
      if (negotiation.correlationId === correlationId) return structuredClone(negotiation);
    }
    return null;
  }

  async findContractAgreement(agreementId: string): Promise<ContractAgreement | null> {
    for (const { negotiation } of this.entries.values()) {
      if (negotiation.contractAgreement?.id === agreementId) {
        return structuredClone(negotiation.contractAgreement);
      }
    }
    return null;
  }

  async queryNegotiations(spec: QuerySpec): Promise<ContractNegotiation[]> {
    const all = [...this.entries.values()].map((e) => e.negotiation);
    return applyQuery(all, spec).map((n) => structuredClone(n));
  }

  async save(negotiation: ContractNegotiation): Promise<StoreResult<ContractNegotiation>> {
    const existing = this.entries.get(negotiation.id);
    const expected = negotiation.stateCount - 1;
    if (!existing && expected !== 0) {
      return { ok: false, reason: 'NOT_FOUND', message: `negotiation ${negotiation.id} does not exist` };
    }
    if (existing && existing.negotiation.stateCount !== expected) {
      return {
        ok: false,
        reason: 'CONFLICT',
        message: `negotiation ${negotiation.id} is at version ${existing.negotiation.stateCount}, expected ${expected}`,
      };
    }
    // pendingCommand lives only in the owning manager's queue
    const stored = { ...structuredClone(negotiation), pendingCommand: null };
    this.entries.set(negotiation.id, { negotiation: stored, lease: null });
    return { ok: true, value: structuredClone(stored) };
  }

  async leaseNextByState(state: number, request: LeaseRequest): Promise<ContractNegotiation[]> {
    const now = this.clock();
    const due = [...this.entries.values()]
      .filter((e) => e.negotiation.state === state && e.negotiation.type === request.type && !this.isLeased(e, now))
      .sort((a, b) => a.negotiation.stateTimestamp - b.negotiation.stateTimestamp)
      .slice(0, request.batchSize);
    for (const entry of due) {
      entry.lease = { holder: request.holder, expiresAt: now + this.leaseDurationMs };
    }
    return due.map((e) => structuredClone(e.negotiation));
  }

  async leaseById(id: string, holder: string): Promise<StoreResult<ContractNegotiation>> {
    const entry = this.entries.get(id);
    if (!entry) return { ok: false, reason: 'NOT_FOUND', message: `negotiation ${id} does not exist` };
    const now = this.clock();
    if (this.isLeased(entry, now) && entry.lease?.holder !== holder) {
      return { ok: false, reason: 'CONFLICT', message: `negotiation ${id} is leased by ${entry.lease?.holder}` };
    }
    entry.lease = { holder, expiresAt: now + this.leaseDurationMs };
    return { ok: true, value: structuredClone(entry.negotiation) };
  }

  async releaseLease(id: string, holder: string): Promise<void> {
    const entry = this.entries.get(id);
    if (entry?.lease?.holder === holder) entry.lease = null;
  }

  private isLeased(entry: Entry, now: number): boolean {
    return entry.lease !== null && entry.lease.expiresAt > now;
  }
}
