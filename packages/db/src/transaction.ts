import { AsyncLocalStorage } from "node:async_hooks";
import type { ExtractTablesWithRelations } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type { TransactionContext } from "@covenant/negotiation";
import type { Database } from "./client.js";
import type * as schema from "./schema/index.js";

/** Either the database itself or an open transaction on it. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema, ExtractTablesWithRelations<typeof schema>>;

/**
 * Runs a unit of work in one database transaction and exposes that
 * transaction to every store call made inside it. Nested calls join the
 * outer transaction.
 */
export class DrizzleTransactionContext implements TransactionContext {
  private readonly storage = new AsyncLocalStorage<Executor>();

  constructor(private readonly db: Database) {}

  execute<T>(work: () => Promise<T>): Promise<T> {
    if (this.storage.getStore()) return work();
    return this.db.transaction((tx) => this.storage.run(tx, work));
  }

  /** The open transaction, or the database outside of one. */
  current(): Executor {
    return this.storage.getStore() ?? this.db;
  }
}
