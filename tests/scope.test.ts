import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
  parseFilters,
  requireEntityScope,
  resolveDeleteAllScope,
  resolveReadScope,
  resolveWriteScope,
} from '../src/scope.js';

describe('parseFilters', () => {
  it('returns empty scope and metadata when there are no filters', () => {
    expect(parseFilters(undefined)).toEqual({ scope: {}, metadata: {} });
  });

  it('reads scope ids from plain values', () => {
    expect(parseFilters({ user_id: 'john', run_id: 'r1' })).toEqual({
      scope: { userId: 'john', runId: 'r1' },
      metadata: {},
    });
  });

  it('flattens AND clauses into scope and metadata', () => {
    const parsed = parseFilters({
      AND: [{ user_id: { eq: 'john' } }, { topic: 'travel' }, { AND: [{ priority: 2 }] }],
    });

    expect(parsed).toEqual({
      scope: { userId: 'john' },
      metadata: { topic: 'travel', priority: 2 },
    });
  });

  it('takes the first entry of an in-list for scope ids', () => {
    expect(parseFilters({ AND: [{ user_id: { in: ['jane', 'john'] } }] }).scope).toEqual({ userId: 'jane' });
  });

  it('turns numeric scope ids into strings', () => {
    expect(parseFilters({ agent_id: 7 }).scope).toEqual({ agentId: '7' });
  });

  it('accepts the same value twice for one field', () => {
    expect(parseFilters({ user_id: 'a', AND: [{ user_id: 'a' }] }).scope).toEqual({ userId: 'a' });
  });

  it('rejects conflicting values for one field', () => {
    expect(() => parseFilters({ AND: [{ user_id: 'a' }, { user_id: 'b' }] })).toThrow(
      new ValidationError('Conflicting values for filter field "user_id"'),
    );
  });

  it('rejects OR and NOT', () => {
    expect(() => parseFilters({ OR: [{ user_id: 'a' }] })).toThrow('Filter operator "OR" is not supported');
    expect(() => parseFilters({ NOT: [{ user_id: 'a' }] })).toThrow('Filter operator "NOT" is not supported');
  });

  it('rejects range operators and in-lists on metadata fields', () => {
    expect(() => parseFilters({ created_at: { gte: '2024-01-01' } })).toThrow(
      'Unsupported condition for filter field "created_at"',
    );
    expect(() => parseFilters({ topic: { in: ['a', 'b'] } })).toThrow(
      'Unsupported condition for filter field "topic"',
    );
  });

  it('rejects malformed AND clauses', () => {
    expect(() => parseFilters({ AND: { user_id: 'a' } })).toThrow('"AND" must be an array of filter clauses');
    expect(() => parseFilters({ AND: ['user_id'] })).toThrow('Each filter clause must be an object');
  });

  it('raises ValidationError instances', () => {
    expect(() => parseFilters({ OR: [] })).toThrow(ValidationError);
  });
});

describe('resolveWriteScope', () => {
  it('uses the explicit user id', () => {
    expect(resolveWriteScope({ user_id: 'u1' }, 'fallback')).toEqual({ userId: 'u1' });
  });

  it('falls back to the default user when nothing is given', () => {
    expect(resolveWriteScope({}, 'fallback')).toEqual({ userId: 'fallback' });
  });

  it('does not add the default user to agent or run writes', () => {
    expect(resolveWriteScope({ agent_id: 'planner' }, 'fallback')).toEqual({ agentId: 'planner' });
    expect(resolveWriteScope({ run_id: 'r1' }, 'fallback')).toEqual({ runId: 'r1' });
  });
});

describe('resolveReadScope', () => {
  it('prefers explicit ids over ids from filters', () => {
    expect(resolveReadScope({ user_id: 'u1' }, { userId: 'u2', runId: 'r9' }, 'fallback')).toEqual({
      userId: 'u1',
      runId: 'r9',
    });
  });

  it('uses ids from filters when no explicit ids are given', () => {
    expect(resolveReadScope({}, { agentId: 'planner' }, 'fallback')).toEqual({ agentId: 'planner' });
  });

  it('falls back to the default user for an empty scope', () => {
    expect(resolveReadScope({}, {}, 'fallback')).toEqual({ userId: 'fallback' });
  });
});

describe('resolveDeleteAllScope', () => {
  it('always includes a user id', () => {
    expect(resolveDeleteAllScope({}, 'fallback')).toEqual({ userId: 'fallback' });
    expect(resolveDeleteAllScope({ agent_id: 'planner' }, 'fallback')).toEqual({
      userId: 'fallback',
      agentId: 'planner',
    });
    expect(resolveDeleteAllScope({ user_id: 'u1' }, 'fallback')).toEqual({ userId: 'u1' });
  });
});

describe('requireEntityScope', () => {
  it('returns the given ids', () => {
    expect(requireEntityScope({ agent_id: 'planner', run_id: 'r1' })).toEqual({ agentId: 'planner', runId: 'r1' });
  });

  it('rejects a call without any id', () => {
    expect(() => requireEntityScope({})).toThrow(
      'Provide user_id, agent_id, or run_id before calling delete_entities.',
    );
  });
});
