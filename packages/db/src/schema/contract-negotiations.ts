import { pgTable, text, integer, bigint, jsonb, index } from "drizzle-orm/pg-core";
import type { ContractOffer } from "@covenant/shared";
import { contractAgreements } from "./contract-agreements.js";

export const contractNegotiations = pgTable(
  "contract_negotiations",
  {
    id: text("id").primaryKey(),
    correlationId: text("correlation_id").notNull(),
    type: text("type", { enum: ["CONSUMER", "PROVIDER"] }).notNull(),
    counterPartyId: text("counter_party_id").notNull(),
    counterPartyAddress: text("counter_party_address").notNull(),
    protocol: text("protocol").notNull(),
    state: integer("state").notNull(),
    stateCount: integer("state_count").notNull(),
    stateTimestamp: bigint("state_timestamp", { mode: "number" }).notNull(),
    contractOffers: jsonb("contract_offers").$type<ContractOffer[]>().notNull(),
    contractAgreementId: text("contract_agreement_id").references(() => contractAgreements.id),
    errorDetail: text("error_detail"),
    // lease — set by the claiming loop, cleared on every successful write
    leaseHolder: text("lease_holder"),
    leaseExpiresAt: bigint("lease_expires_at", { mode: "number" }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => ({
    correlationIdx: index("contract_negotiations_correlation_idx").on(table.correlationId),
    leasingIdx: index("contract_negotiations_leasing_idx").on(table.state, table.type, table.stateTimestamp),
  }),
);
