import { z } from 'zod';
import { contractNegotiationSchema, type QuerySpec, type ServiceFailure } from '@covenant/shared';

/** Strip optional/nullable/default wrappers and step through arrays. */
function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  if (schema instanceof z.ZodArray) {
    return unwrap(schema.element);
  }
  return schema;
}

/** Filled in on reads from the manager's command queue, never stored. */
const UNSTORED_FIELDS: ReadonlySet<string> = new Set(['pendingCommand']);

/**
 * Resolve a dotted path against a schema. Returns an error message, or null
 * when every segment names an existing field and the path ends on a value
 * rather than an object or map. Free-form values (unknown) accept any deeper
 * segments.
 */
export function validateFilterPath(
  path: string,
  schema: z.ZodTypeAny = contractNegotiationSchema,
): string | null {
  const segments = path.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    return `incomplete path '${path}'`;
  }

  let current = unwrap(schema);
  for (const [index, segment] of segments.entries()) {
    if (current instanceof z.ZodObject) {
      const shape: Record<string, z.ZodTypeAny> = current.shape;
      if (!Object.hasOwn(shape, segment)) {
        return `unknown field '${segment}' in path '${path}'`;
      }
      current = unwrap(shape[segment]);
      continue;
    }
    if (current instanceof z.ZodRecord) {
      current = unwrap(current.valueSchema);
      continue;
    }
    if (current instanceof z.ZodUnknown || current instanceof z.ZodAny) {
      return null;
    }
    const parent = segments.slice(0, index).join('.');
    return `'${parent}' has no field '${segment}'`;
  }
  if (current instanceof z.ZodObject || current instanceof z.ZodRecord) {
    return `incomplete path '${path}'`;
  }
  return null;
}

function validateStoredPath(path: string): string | null {
  const [root] = path.split('.');
  if (UNSTORED_FIELDS.has(root)) return `'${root}' cannot be queried`;
  return validateFilterPath(path);
}

/** Validate every filter and sort path of a query before it reaches a store. */
export function validateQuerySpec(spec: QuerySpec): ServiceFailure | null {
  for (const criterion of spec.filterExpression) {
    const error = validateStoredPath(criterion.operandLeft);
    if (error) return { reason: 'BAD_REQUEST', message: `invalid filter: ${error}` };
  }
  if (spec.sortField !== undefined) {
    const error = spec.sortField.includes('.')
      ? `cannot sort on nested path '${spec.sortField}'`
      : validateStoredPath(spec.sortField);
    if (error) return { reason: 'BAD_REQUEST', message: `invalid sort field: ${error}` };
  }
  return null;
}
