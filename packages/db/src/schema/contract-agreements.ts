import { pgTable, text, bigint, jsonb } from "drizzle-orm/pg-core";
import type { Policy } from "@covenant/shared";

export const contractAgreements = pgTable("contract_agreements", {
  id: text("id").primaryKey(),
  providerAgentId: text("provider_agent_id").notNull(),
  consumerAgentId: text("consumer_agent_id").notNull(),
  assetId: text("asset_id").notNull(),
  policy: jsonb("policy").$type<Policy>().notNull(),
  contractSigningDate: bigint("contract_signing_date", { mode: "number" }).notNull(),
  contractStartDate: bigint("contract_start_date", { mode: "number" }).notNull(),
  contractEndDate: bigint("contract_end_date", { mode: "number" }).notNull(),
});
