import type { ContractNegotiation, Criterion, QuerySpec } from '@covenant/shared';

/**
 * Collect every value reachable under a dotted path. Arrays fan out, so
 * "contractOffers.assetId" yields one value per offer.
 */
export function resolvePath(source: unknown, path: string): unknown[] {
  let current: unknown[] = [source];
  for (const segment of path.split('.')) {
    const next: unknown[] = [];
    for (const value of current.flatMap((v) => (Array.isArray(v) ? v : [v]))) {
      if (isRecord(value) && Object.hasOwn(value, segment)) {
        next.push(value[segment]);
      }
    }
    current = next;
  }
  return current.flatMap((v) => (Array.isArray(v) ? v : [v]));
}

export function matchesCriterion(negotiation: ContractNegotiation, criterion: Criterion): boolean {
  const values = resolvePath(negotiation, criterion.operandLeft);
  switch (criterion.operator) {
    case '=':
      return values.some((v) => sameValue(v, criterion.operandRight));
    case '!=':
      return !values.some((v) => sameValue(v, criterion.operandRight));
    case 'in': {
      const candidates = Array.isArray(criterion.operandRight) ? criterion.operandRight : [criterion.operandRight];
      return values.some((v) => candidates.some((c) => sameValue(v, c)));
    }
    case 'like': {
      const pattern = likePattern(String(criterion.operandRight));
      return values.some((v) => typeof v === 'string' && pattern.test(v));
    }
  }
}

/** Filter, sort and page an in-memory collection the way a store would. */
export function applyQuery(negotiations: ContractNegotiation[], spec: QuerySpec): ContractNegotiation[] {
  const filtered = negotiations.filter((n) => spec.filterExpression.every((c) => matchesCriterion(n, c)));
  const { sortField } = spec;
  if (sortField !== undefined) {
    const direction = spec.sortOrder === 'DESC' ? -1 : 1;
    filtered.sort((a, b) => direction * compare(resolvePath(a, sortField)[0], resolvePath(b, sortField)[0]));
  }
  return filtered.slice(spec.offset, spec.offset + spec.limit);
}

// Query values arrive as strings from the string filter form, so compare on the
// string rendering of scalars.
function sameValue(stored: unknown, expected: unknown): boolean {
  if (stored === expected) return true;
  if (isScalar(stored) && isScalar(expected)) return String(stored) === String(expected);
  return false;
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a ?? '').localeCompare(String(b ?? ''));
}

function likePattern(like: string): RegExp {
  const escaped = like.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/%/g, '.*').replace(/_/g, '.');
  return new RegExp(`^${escaped}$`);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
