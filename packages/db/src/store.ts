import { and, eq, inArray, isNull, lte, or, asc, type SQL } from "drizzle-orm";
import type {
  ContractNegotiationStore,
  LeaseRequest,
  StoreResult,
} from "@covenant/negotiation";
import type { ContractAgreement, ContractNegotiation, QuerySpec } from "@covenant/shared";
import type { Database } from "./client.js";
import { toOrderBy, toWhere } from "./filters.js";
import { toAgreement, toAgreementRow, toNegotiation, toNegotiationRow } from "./mapping.js";
import { contractAgreements, contractNegotiations } from "./schema/index.js";
import type { DrizzleTransactionContext, Executor } from "./transaction.js";

const cn = contractNegotiations;
const ca = contractAgreements;

export interface DrizzleStoreOptions {
  leaseDurationMs?: number;
  clock?: () => number;
  /** Store calls join the transaction this context has open. */
  transactions?: DrizzleTransactionContext;
}

const DEFAULT_LEASE_DURATION_MS = 60_000;

/**
 * Postgres implementation of the negotiation store. Writes are conditional
 * updates on `state_count`; leases are conditional updates on the lease
 * columns. No row locks are held between calls.
 */
export class DrizzleNegotiationStore implements ContractNegotiationStore {
  private readonly leaseDurationMs: number;
  private readonly clock: () => number;
  private readonly transactions: DrizzleTransactionContext | undefined;

  constructor(
    private readonly db: Database,
    options: DrizzleStoreOptions = {},
  ) {
    this.leaseDurationMs = options.leaseDurationMs ?? DEFAULT_LEASE_DURATION_MS;
    this.clock = options.clock ?? Date.now;
    this.transactions = options.transactions;
  }

  async findById(id: string): Promise<ContractNegotiation | null> {
    const [found] = await this.selectNegotiations(eq(cn.id, id));
    return found ?? null;
  }

  async findForCorrelationId(correlationId: string): Promise<ContractNegotiation | null> {
    const [found] = await this.selectNegotiations(eq(cn.correlationId, correlationId));
    return found ?? null;
  }

  async findContractAgreement(agreementId: string): Promise<ContractAgreement | null> {
    const [row] = await this.executor().select().from(ca).where(eq(ca.id, agreementId)).limit(1);
    return row ? toAgreement(row) : null;
  }

  async queryNegotiations(spec: QuerySpec): Promise<ContractNegotiation[]> {
    const rows = await this.executor()
      .select({ negotiation: cn, agreement: ca })
      .from(cn)
      .leftJoin(ca, eq(cn.contractAgreementId, ca.id))
      .where(toWhere(spec))
      .orderBy(toOrderBy(spec))
      .limit(spec.limit)
      .offset(spec.offset);
    return rows.map((r) => toNegotiation(r.negotiation, r.agreement));
  }

  save(negotiation: ContractNegotiation): Promise<StoreResult<ContractNegotiation>> {
    return this.executor().transaction(async (tx): Promise<StoreResult<ContractNegotiation>> => {
      const { id, stateCount } = negotiation;
      if (negotiation.contractAgreement) {
        await tx.insert(ca).values(toAgreementRow(negotiation.contractAgreement)).onConflictDoNothing();
      }

      const row = toNegotiationRow(negotiation);
      const written =
        stateCount === 1
          ? await tx.insert(cn).values(row).onConflictDoNothing().returning({ id: cn.id })
          : await tx
              .update(cn)
              .set(row)
              .where(and(eq(cn.id, id), eq(cn.stateCount, stateCount - 1)))
              .returning({ id: cn.id });

      if (written.length === 0) {
        const [current] = await tx.select({ stateCount: cn.stateCount }).from(cn).where(eq(cn.id, id)).limit(1);
        if (!current) return { ok: false, reason: "NOT_FOUND", message: `negotiation ${id} does not exist` };
        return {
          ok: false,
          reason: "CONFLICT",
          message: `negotiation ${id} is at version ${current.stateCount}, expected ${stateCount - 1}`,
        };
      }
      return { ok: true, value: { ...negotiation, pendingCommand: null } };
    });
  }

  async leaseNextByState(state: number, request: LeaseRequest): Promise<ContractNegotiation[]> {
    const now = this.clock();
    const db = this.executor();
    const candidates = db
      .select({ id: cn.id })
      .from(cn)
      .where(and(eq(cn.state, state), eq(cn.type, request.type), this.unleased(now)))
      .orderBy(asc(cn.stateTimestamp))
      .limit(request.batchSize);

    const leased = await db
      .update(cn)
      .set({ leaseHolder: request.holder, leaseExpiresAt: now + this.leaseDurationMs })
      .where(and(inArray(cn.id, candidates), this.unleased(now)))
      .returning({ id: cn.id });
    if (leased.length === 0) return [];

    const negotiations = await this.selectNegotiations(inArray(cn.id, leased.map((l) => l.id)));
    return negotiations.sort((a, b) => a.stateTimestamp - b.stateTimestamp);
  }

  async leaseById(id: string, holder: string): Promise<StoreResult<ContractNegotiation>> {
    const now = this.clock();
    const db = this.executor();
    const claimed = await db
      .update(cn)
      .set({ leaseHolder: holder, leaseExpiresAt: now + this.leaseDurationMs })
      .where(and(eq(cn.id, id), or(this.unleased(now), eq(cn.leaseHolder, holder))))
      .returning({ id: cn.id });

    const found = await this.findById(id);
    if (!found) return { ok: false, reason: "NOT_FOUND", message: `negotiation ${id} does not exist` };
    if (claimed.length === 0) {
      const [lease] = await db.select({ holder: cn.leaseHolder }).from(cn).where(eq(cn.id, id)).limit(1);
      return { ok: false, reason: "CONFLICT", message: `negotiation ${id} is leased by ${lease?.holder ?? "another holder"}` };
    }
    return { ok: true, value: found };
  }

  async releaseLease(id: string, holder: string): Promise<void> {
    await this.executor()
      .update(cn)
      .set({ leaseHolder: null, leaseExpiresAt: null })
      .where(and(eq(cn.id, id), eq(cn.leaseHolder, holder)));
  }

  private unleased(now: number): SQL | undefined {
    return or(isNull(cn.leaseExpiresAt), lte(cn.leaseExpiresAt, now));
  }

  private async selectNegotiations(where: SQL): Promise<ContractNegotiation[]> {
    const rows = await this.executor()
      .select({ negotiation: cn, agreement: ca })
      .from(cn)
      .leftJoin(ca, eq(cn.contractAgreementId, ca.id))
      .where(where);
    return rows.map((r) => toNegotiation(r.negotiation, r.agreement));
  }

  private executor(): Executor {
    return this.transactions?.current() ?? this.db;
  }
}
