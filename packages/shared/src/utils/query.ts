import {
  QUERY_OPERATORS,
  querySpecSchema,
  type Criterion,
  type QueryOperator,
  type QuerySpec,
} from "../types/query.js";

/** Build a QuerySpec, filling defaults for anything left out. */
export function querySpec(input: Partial<QuerySpec> = {}): QuerySpec {
  return querySpecSchema.parse(input);
}

export function criterion(operandLeft: string, operator: QueryOperator, operandRight: unknown): Criterion {
  return { operandLeft, operator, operandRight };
}

// Longest operators first so "!=" is not read as "=".
const OPERATOR_PATTERN = /^(.*?)\s*(!=|=|\s+in\s+|\s+like\s+)\s*(.*)$/;

/**
 * Parse the string form "path=value", "path!=value", "path in a,b" or
 * "path like %x%". Returns null when no operator is present.
 */
export function parseCriterion(expression: string): Criterion | null {
  const match = OPERATOR_PATTERN.exec(expression);
  if (!match) return null;
  const [, left, rawOperator, right] = match;
  const operator = rawOperator.trim();
  if (!isOperator(operator)) return null;
  const operandRight = operator === "in" ? right.split(",").map((v) => v.trim()) : right;
  return { operandLeft: left.trim(), operator, operandRight };
}

function isOperator(value: string): value is QueryOperator {
  return (QUERY_OPERATORS as readonly string[]).includes(value);
}
