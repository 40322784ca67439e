import { describe, it, expect } from 'vitest';
import { querySpec, criterion } from '@covenant/shared';
import { validateFilterPath, validateQuerySpec } from '../src/query/filter-path.js';

describe('validateFilterPath', () => {
  it.each([
    'state',
    'contractAgreement.contractStartDate',
    'contractAgreement.assetId',
    'contractAgreement.policy.assignee',
    'contractOffers.assetId',
    'contractOffers.policy.permissions.action',
    'contractOffers.policy.extensibleProperties.region',
  ])('accepts %s', (path) => {
    expect(validateFilterPath(path)).toBeNull();
  });

  it.each([
    ['contractAgreement.contractStartDate.begin', "'contractAgreement.contractStartDate' has no field 'begin'"],
    ['contractOffers.policy.uid', "unknown field 'uid' in path 'contractOffers.policy.uid'"],
    ['contractOffers.policy.assetid', "unknown field 'assetid' in path 'contractOffers.policy.assetid'"],
    ['contractOffers.policy.', "incomplete path 'contractOffers.policy.'"],
    ['State', "unknown field 'State' in path 'State'"],
    ['contractAgreement', "incomplete path 'contractAgreement'"],
    ['contractOffers', "incomplete path 'contractOffers'"],
    ['contractOffers.policy', "incomplete path 'contractOffers.policy'"],
    ['contractOffers.policy.extensibleProperties', "incomplete path 'contractOffers.policy.extensibleProperties'"],
  ])('rejects %s', (path, message) => {
    expect(validateFilterPath(path)).toBe(message);
  });

  it('does not resolve inherited object members', () => {
    expect(validateFilterPath('toString')).toBe("unknown field 'toString' in path 'toString'");
  });
});

describe('validateQuerySpec', () => {
  it('accepts a query with valid paths', () => {
    const spec = querySpec({ filterExpression: [criterion('contractAgreement.assetId', '=', 'asset-1')] });
    expect(validateQuerySpec(spec)).toBeNull();
  });

  it('reports the first invalid filter as BAD_REQUEST', () => {
    const spec = querySpec({ filterExpression: [criterion('contractOffers.policy.uid', '=', 'x')] });
    expect(validateQuerySpec(spec)).toEqual({
      reason: 'BAD_REQUEST',
      message: "invalid filter: unknown field 'uid' in path 'contractOffers.policy.uid'",
    });
  });

  it('validates the sort field', () => {
    const spec = querySpec({ sortField: 'stateTimestamp.value' });
    expect(validateQuerySpec(spec)?.reason).toBe('BAD_REQUEST');
  });

  it('rejects a truncated filter path', () => {
    const spec = querySpec({ filterExpression: [criterion('contractAgreement', '=', 'x')] });
    expect(validateQuerySpec(spec)).toEqual({
      reason: 'BAD_REQUEST',
      message: "invalid filter: incomplete path 'contractAgreement'",
    });
  });

  it('rejects filters and sorts on the unstored pending command', () => {
    const filtered = querySpec({ filterExpression: [criterion('pendingCommand', '=', 'CANCEL')] });
    expect(validateQuerySpec(filtered)).toEqual({
      reason: 'BAD_REQUEST',
      message: "invalid filter: 'pendingCommand' cannot be queried",
    });
    expect(validateQuerySpec(querySpec({ sortField: 'pendingCommand' }))).toEqual({
      reason: 'BAD_REQUEST',
      message: "invalid sort field: 'pendingCommand' cannot be queried",
    });
  });

  it('rejects sorting on a nested path', () => {
    expect(validateQuerySpec(querySpec({ sortField: 'contractAgreement.assetId' }))).toEqual({
      reason: 'BAD_REQUEST',
      message: "invalid sort field: cannot sort on nested path 'contractAgreement.assetId'",
    });
  });

  it('accepts sorting on a top-level field', () => {
    expect(validateQuerySpec(querySpec({ sortField: 'stateTimestamp', sortOrder: 'DESC' }))).toBeNull();
  });
});
