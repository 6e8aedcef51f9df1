import { ValidationError } from './errors.js';
import type { FilterValue, MetadataFilters, Scope } from './types.js';

// Tool arguments use snake_case scope ids; the backend takes camelCase.
const SCOPE_FIELDS = new Map<string, keyof Scope>([
  ['user_id', 'userId'],
  ['agent_id', 'agentId'],
  ['run_id', 'runId'],
]);

export interface ScopeArgs {
  user_id?: string;
  agent_id?: string;
  run_id?: string;
}

export interface ParsedFilters {
  scope: Scope;
  metadata: MetadataFilters;
}

interface FilterAccumulator {
  scope: Partial<Record<keyof Scope, FilterValue>>;
  metadata: MetadataFilters;
}

// ── Filters ────────────────────────────────────────────────────────

function isFilterValue(value: unknown): value is FilterValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function conditionValue(field: string, condition: unknown, isScopeField: boolean): FilterValue {
  if (isFilterValue(condition)) return condition;

  if (isObject(condition)) {
    const operators = Object.keys(condition);
    if (operators.length === 1 && isFilterValue(condition.eq)) {
      return condition.eq;
    }
    // A scope id can only take one value per call, so `in` narrows to
    // its first entry.
    const candidates = condition.in;
    if (
      isScopeField &&
      operators.length === 1 &&
      Array.isArray(candidates) &&
      isFilterValue(candidates[0])
    ) {
      return candidates[0];
    }
  }

  throw new ValidationError(`Unsupported condition for filter field "${field}"`);
}

function assign<K extends string>(
  target: Partial<Record<K, FilterValue>>,
  key: K,
  value: FilterValue,
  field: string,
): void {
  const existing = target[key];
  if (existing !== undefined && existing !== value) {
    throw new ValidationError(`Conflicting values for filter field "${field}"`);
  }
  target[key] = value;
}

function walk(node: unknown, parsed: FilterAccumulator): void {
  if (!isObject(node)) {
    throw new ValidationError('Each filter clause must be an object');
  }

  for (const [field, condition] of Object.entries(node)) {
    if (field === 'AND') {
      if (!Array.isArray(condition)) {
        throw new ValidationError('"AND" must be an array of filter clauses');
      }
      for (const clause of condition) walk(clause, parsed);
      continue;
    }
    if (field === 'OR' || field === 'NOT') {
      throw new ValidationError(`Filter operator "${field}" is not supported`);
    }

    const scopeField = SCOPE_FIELDS.get(field);
    if (scopeField) {
      assign(parsed.scope, scopeField, conditionValue(field, condition, true), field);
    } else {
      assign(parsed.metadata, field, conditionValue(field, condition, false), field);
    }
  }
}

/**
 * Splits a filter mapping into scope ids and flat metadata equality
 * filters. Clauses under `AND` are flattened.
 */
export function parseFilters(filters: Record<string, unknown> | undefined): ParsedFilters {
  const parsed: FilterAccumulator = { scope: {}, metadata: {} };
  if (filters) walk(filters, parsed);

  const { userId, agentId, runId } = parsed.scope;
  return {
    scope: compact({
      userId: userId === undefined ? undefined : String(userId),
      agentId: agentId === undefined ? undefined : String(agentId),
      runId: runId === undefined ? undefined : String(runId),
    }),
    metadata: parsed.metadata,
  };
}

// ── Scope resolution ───────────────────────────────────────────────

function compact(scope: Scope): Scope {
  const result: Scope = {};
  if (scope.userId) result.userId = scope.userId;
  if (scope.agentId) result.agentId = scope.agentId;
  if (scope.runId) result.runId = scope.runId;
  return result;
}

export function hasScope(scope: Scope): boolean {
  return Boolean(scope.userId || scope.agentId || scope.runId);
}

export function scopeFromArgs(args: ScopeArgs): Scope {
  return compact({ userId: args.user_id, agentId: args.agent_id, runId: args.run_id });
}

/** The default user applies only when no agent or run id was given. */
export function resolveWriteScope(args: ScopeArgs, defaultUserId: string): Scope {
  const scope = scopeFromArgs(args);
  return hasScope(scope) ? scope : { userId: defaultUserId };
}

/** Explicit ids win over ids found in filters; the default user fills an empty scope. */
export function resolveReadScope(args: ScopeArgs, fromFilters: Scope, defaultUserId: string): Scope {
  const scope = compact({
    userId: args.user_id ?? fromFilters.userId,
    agentId: args.agent_id ?? fromFilters.agentId,
    runId: args.run_id ?? fromFilters.runId,
  });
  return hasScope(scope) ? scope : { userId: defaultUserId };
}

export function resolveDeleteAllScope(args: ScopeArgs, defaultUserId: string): Scope {
  return compact({
    userId: args.user_id ?? defaultUserId,
    agentId: args.agent_id,
    runId: args.run_id,
  });
}

export function requireEntityScope(args: ScopeArgs): Scope {
  const scope = scopeFromArgs(args);
  if (!hasScope(scope)) {
    throw new ValidationError('Provide user_id, agent_id, or run_id before calling delete_entities.');
  }
  return scope;
}
