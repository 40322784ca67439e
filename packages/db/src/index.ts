export { createDb } from "./client.js";
export type { Database, DbOptions } from "./client.js";

// Re-export schema for convenience
export * from "./schema/index.js";

export { DrizzleNegotiationStore } from "./store.js";
export type { DrizzleStoreOptions } from "./store.js";
export { DrizzleTransactionContext } from "./transaction.js";
export type { Executor } from "./transaction.js";
export { NegotiationStoreError } from "./errors.js";
export { resolveField, toCondition, toJsonPath, toOrderBy, toWhere } from "./filters.js";
export type { ResolvedField } from "./filters.js";
export { toAgreement, toAgreementRow, toNegotiation, toNegotiationRow } from "./mapping.js";
