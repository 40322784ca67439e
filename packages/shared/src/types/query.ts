import { z } from "zod";

export const QUERY_OPERATORS = ["=", "!=", "in", "like"] as const;

export const criterionSchema = z.object({
  operandLeft: z.string(),
  operator: z.enum(QUERY_OPERATORS),
  operandRight: z.unknown(),
});

export const querySpecSchema = z.object({
  filterExpression: z.array(criterionSchema).default([]),
  offset: z.number().int().nonnegative().default(0),
  limit: z.number().int().positive().max(1000).default(50),
  sortField: z.string().optional(),
  sortOrder: z.enum(["ASC", "DESC"]).default("ASC"),
});

export type QueryOperator = (typeof QUERY_OPERATORS)[number];
export type Criterion = z.infer<typeof criterionSchema>;
export type QuerySpec = z.infer<typeof querySpecSchema>;
