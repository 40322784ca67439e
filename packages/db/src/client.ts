import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export type Database = ReturnType<typeof createDb>;

export interface DbOptions {
  /** Connection pool size. */
  max?: number;
}

export function createDb(connectionString: string, options: DbOptions = {}) {
  const client = postgres(connectionString, {
    prepare: false, // Required for transaction-mode connection poolers
    max: options.max ?? 10,
  });

  return drizzle(client, { schema });
}
