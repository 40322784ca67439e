import { and, asc, desc, eq, inArray, like, not, sql, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import type { Criterion, QuerySpec } from "@covenant/shared";
import { NegotiationStoreError } from "./errors.js";
import { contractAgreements, contractNegotiations } from "./schema/index.js";

const cn = contractNegotiations;
const ca = contractAgreements;

/** A filter path resolved to a plain column, or to a location inside a jsonb column. */
export type ResolvedField =
  | { kind: "column"; column: PgColumn }
  | { kind: "json"; column: PgColumn; jsonPath: string };

const NEGOTIATION_COLUMNS: Record<string, PgColumn> = {
  id: cn.id,
  correlationId: cn.correlationId,
  type: cn.type,
  counterPartyId: cn.counterPartyId,
  counterPartyAddress: cn.counterPartyAddress,
  protocol: cn.protocol,
  state: cn.state,
  stateCount: cn.stateCount,
  stateTimestamp: cn.stateTimestamp,
  errorDetail: cn.errorDetail,
  createdAt: cn.createdAt,
  updatedAt: cn.updatedAt,
};

const AGREEMENT_COLUMNS: Record<string, PgColumn> = {
  id: ca.id,
  providerAgentId: ca.providerAgentId,
  consumerAgentId: ca.consumerAgentId,
  assetId: ca.assetId,
  contractSigningDate: ca.contractSigningDate,
  contractStartDate: ca.contractStartDate,
  contractEndDate: ca.contractEndDate,
};

/**
 * Lax-mode jsonpath for the given keys. Lax mode steps through arrays on its
 * own, so "$.\"assetId\"" applied to the offers array yields every offer's asset.
 */
export function toJsonPath(segments: readonly string[]): string {
  return segments.reduce((path, segment) => `${path}.${JSON.stringify(segment)}`, "$");
}

/** Map a validated filter path onto the stored columns. */
export function resolveField(path: string): ResolvedField {
  const [root, ...rest] = path.split(".");

  if (root === "contractOffers") {
    return { kind: "json", column: cn.contractOffers, jsonPath: toJsonPath(rest) };
  }
  if (root === "contractAgreement") {
    const [field, ...nested] = rest;
    if (field === "policy") {
      return { kind: "json", column: ca.policy, jsonPath: toJsonPath(nested) };
    }
    if (field !== undefined && nested.length === 0 && Object.hasOwn(AGREEMENT_COLUMNS, field)) {
      return { kind: "column", column: AGREEMENT_COLUMNS[field] };
    }
    throw new NegotiationStoreError(`cannot query '${path}'`);
  }
  if (rest.length === 0 && Object.hasOwn(NEGOTIATION_COLUMNS, root)) {
    return { kind: "column", column: NEGOTIATION_COLUMNS[root] };
  }
  throw new NegotiationStoreError(`cannot query '${path}'`);
}

// Values compare on their text form, the same way the string filter syntax
// writes them. "!=" builds the "=" match; callers negate it.
function matchText(text: SQL, criterion: Criterion): SQL {
  const { operator, operandRight } = criterion;
  switch (operator) {
    case "=":
    case "!=":
      return eq(text, String(operandRight));
    case "in": {
      const values = Array.isArray(operandRight) ? operandRight : [operandRight];
      return inArray(text, values.map(String));
    }
    case "like":
      return like(text, String(operandRight));
  }
}

export function toCondition(criterion: Criterion): SQL {
  const field = resolveField(criterion.operandLeft);
  const negate = criterion.operator === "!=";

  if (field.kind === "column") {
    const text = sql`${field.column}::text`;
    if (negate) return sql`${text} is distinct from ${String(criterion.operandRight)}`;
    return matchText(text, criterion);
  }

  const value = sql.raw(`match.value #>> '{}'`);
  const matches = sql`exists (select 1 from jsonb_path_query(${field.column}, ${field.jsonPath}::jsonpath) as match(value) where ${matchText(value, criterion)})`;
  return negate ? not(matches) : matches;
}

export function toWhere(spec: QuerySpec): SQL | undefined {
  if (spec.filterExpression.length === 0) return undefined;
  return and(...spec.filterExpression.map(toCondition));
}

export function toOrderBy(spec: QuerySpec): SQL {
  if (spec.sortField === undefined) return asc(cn.createdAt);
  const field = resolveField(spec.sortField);
  if (field.kind !== "column") {
    throw new NegotiationStoreError(`cannot sort on nested path '${spec.sortField}'`);
  }
  return spec.sortOrder === "DESC" ? desc(field.column) : asc(field.column);
}
