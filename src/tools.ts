import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Logger } from 'pino';
import { NotFoundError, UnsupportedOperationError, ValidationError } from './errors.js';
import { callMemory, type ToolResult } from './memory-call.js';
import {
  parseFilters,
  requireEntityScope,
  resolveDeleteAllScope,
  resolveReadScope,
  resolveWriteScope,
} from './scope.js';
import type { ConversationMessage, MemoryBackend, ServerSettings } from './types.js';

export const DEFAULT_LIST_LIMIT = 100;

export interface ToolContext {
  backend: MemoryBackend;
  settings: ServerSettings;
  logger: Logger;
}

// ── Zod schemas ────────────────────────────────────────────────────

const idSchema = z.string().min(1);

const scopeShape = {
  user_id: idSchema.optional().describe('User scope; defaults to the server user when no scope is given'),
  agent_id: idSchema.optional().describe('Agent scope'),
  run_id: idSchema.optional().describe('Run scope'),
};

const filtersSchema = z
  .record(z.unknown())
  .optional()
  .describe(
    'Equality filters. Field values may be plain values or {"eq": value}; combine clauses with {"AND": [...]}. ' +
      'user_id, agent_id and run_id set the scope and also accept {"in": [...]} (first entry wins).',
  );

const messageSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
});

export const addMemoryShape = {
  text: z.string().describe('Plain sentence summarizing what to store. Required even if `messages` is provided.'),
  messages: z
    .array(messageSchema)
    .optional()
    .describe('Conversation turns with role/content. Used instead of `text` when non-empty.'),
  ...scopeShape,
  metadata: z.record(z.unknown()).optional().describe('Arbitrary metadata attached to the stored memories'),
};

export const searchMemoriesShape = {
  query: z.string().min(1).describe('Natural language description of what to find'),
  ...scopeShape,
  filters: filtersSchema,
  limit: z.number().int().positive().optional().describe('Maximum number of results'),
};

export const getMemoriesShape = {
  ...scopeShape,
  filters: filtersSchema,
  page: z.number().int().optional().describe('1-indexed page number; used with page_size'),
  page_size: z.number().int().optional().describe('Memories per page'),
  limit: z.number().int().positive().optional().describe(`Maximum memories when not paginating (default ${DEFAULT_LIST_LIMIT})`),
};

export const memoryIdShape = {
  memory_id: idSchema.describe('Exact memory_id'),
};

export const updateMemoryShape = {
  memory_id: idSchema.describe('Exact memory_id to overwrite'),
  text: z.string().min(1).describe('Replacement text for the memory'),
};

export const scopeOnlyShape = scopeShape;

const addMemorySchema = z.object(addMemoryShape);
const searchMemoriesSchema = z.object(searchMemoriesShape);
const getMemoriesSchema = z.object(getMemoriesShape);
const memoryIdSchema = z.object(memoryIdShape);
const updateMemorySchema = z.object(updateMemoryShape);
const scopeOnlySchema = z.object(scopeOnlyShape);

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid arguments: ${details}`);
  }
  return parsed.data;
}

// Shapes registered with the server accept any value per field, so the
// SDK passes arguments through and parseArgs reports failures as
// ValidationError envelopes.
function registeredShape(shape: z.ZodRawShape): z.ZodRawShape {
  const loose: z.ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    const accepted = z.unknown().optional();
    loose[key] = field.description === undefined ? accepted : accepted.describe(field.description);
  }
  return loose;
}

// ── Argument helpers ───────────────────────────────────────────────

function toConversation(text: string, messages: ConversationMessage[] | undefined): ConversationMessage[] {
  if (messages && messages.length > 0) return messages;
  if (text.trim() !== '') return [{ role: 'user', content: text }];
  throw new ValidationError('Provide either `text` or `messages` so there is something to store.');
}

interface PageWindow {
  fetch: number;
  start: number;
  end: number;
}

export function pageWindow(page: number | undefined, pageSize: number | undefined, limit: number | undefined): PageWindow {
  if (pageSize === undefined) {
    const fetch = limit ?? DEFAULT_LIST_LIMIT;
    return { fetch, start: 0, end: fetch };
  }
  const pageNum = Math.max(page ?? 1, 1);
  const size = Math.max(pageSize, 1);
  const start = (pageNum - 1) * size;
  return { fetch: pageNum * size, start, end: start + size };
}

// ── Handler factories ──────────────────────────────────────────────
// Each factory closes over a ToolContext, returning a handler that the
// MCP server can invoke. Handlers validate their own arguments so they
// report the same error envelope whether or not a server sits in front.

export function handleAddMemory(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('add_memory', async () => {
      const input = parseArgs(addMemorySchema, args);
      const conversation = toConversation(input.text, input.messages);
      const scope = resolveWriteScope(input, ctx.settings.defaultUserId);
      return ctx.backend.add(conversation, { scope, metadata: input.metadata });
    }, ctx.logger);
}

export function handleSearchMemories(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('search_memories', async () => {
      const input = parseArgs(searchMemoriesSchema, args);
      const filters = parseFilters(input.filters);
      const scope = resolveReadScope(input, filters.scope, ctx.settings.defaultUserId);
      return ctx.backend.search(input.query, {
        scope,
        filters: filters.metadata,
        limit: input.limit,
      });
    }, ctx.logger);
}

export function handleGetMemories(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('get_memories', async () => {
      const input = parseArgs(getMemoriesSchema, args);
      const filters = parseFilters(input.filters);
      const scope = resolveReadScope(input, filters.scope, ctx.settings.defaultUserId);
      const window = pageWindow(input.page, input.page_size, input.limit);
      const records = await ctx.backend.list({ scope, filters: filters.metadata, limit: window.fetch });
      return records.slice(window.start, window.end);
    }, ctx.logger);
}

export function handleGetMemory(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('get_memory', async () => {
      const { memory_id } = parseArgs(memoryIdSchema, args);
      const record = await ctx.backend.get(memory_id);
      if (!record) throw NotFoundError.memory(memory_id);
      return record;
    }, ctx.logger);
}

export function handleUpdateMemory(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('update_memory', async () => {
      const { memory_id, text } = parseArgs(updateMemorySchema, args);
      return ctx.backend.update(memory_id, text);
    }, ctx.logger);
}

export function handleDeleteMemory(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('delete_memory', async () => {
      const { memory_id } = parseArgs(memoryIdSchema, args);
      return ctx.backend.delete(memory_id);
    }, ctx.logger);
}

export function handleDeleteAllMemories(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('delete_all_memories', async () => {
      const input = parseArgs(scopeOnlySchema, args);
      return ctx.backend.deleteAll(resolveDeleteAllScope(input, ctx.settings.defaultUserId));
    }, ctx.logger);
}

export function handleDeleteEntities(ctx: ToolContext) {
  return async (args: unknown): Promise<ToolResult> =>
    callMemory('delete_entities', async () => {
      const input = parseArgs(scopeOnlySchema, args);
      return ctx.backend.deleteEntity(requireEntityScope(input));
    }, ctx.logger);
}

export const LIST_ENTITIES_UNAVAILABLE = 'list_entities is not available in self-hosted mode';

// Arguments are ignored so the payload is identical for every call.
export function handleListEntities(ctx: ToolContext) {
  return async (): Promise<ToolResult> =>
    callMemory('list_entities', async () => {
      throw new UnsupportedOperationError(LIST_ENTITIES_UNAVAILABLE);
    }, ctx.logger);
}

// ── Registration ───────────────────────────────────────────────────

export function registerTools(server: McpServer, ctx: ToolContext): void {
  // ── Write tools ──

  server.tool(
    'add_memory',
    'Store a new preference, fact, or conversation snippet. Uses the default user unless user_id, agent_id or run_id is given.',
    registeredShape(addMemoryShape),
    handleAddMemory(ctx),
  );

  server.tool(
    'update_memory',
    "Overwrite an existing memory's text once you know its memory_id.",
    registeredShape(updateMemoryShape),
    handleUpdateMemory(ctx),
  );

  // ── Read tools ──

  server.tool(
    'search_memories',
    'Run a semantic search over existing memories. Scope comes from user_id/agent_id/run_id or from the filters; the default user applies otherwise. ' +
      'Filter examples: {"AND": [{"user_id": "john"}]}, {"AND": [{"agent_id": "planner"}, {"topic": "travel"}]}.',
    registeredShape(searchMemoriesShape),
    handleSearchMemories(ctx),
  );

  server.tool(
    'get_memories',
    'List memories by scope and filters instead of searching. Use page (1-indexed) and page_size to browse, or limit for a single batch.',
    registeredShape(getMemoriesShape),
    handleGetMemories(ctx),
  );

  server.tool(
    'get_memory',
    'Fetch a single memory once you know its memory_id.',
    registeredShape(memoryIdShape),
    handleGetMemory(ctx),
  );

  // ── Delete tools ──

  server.tool(
    'delete_memory',
    'Delete one memory after the user confirms its memory_id.',
    registeredShape(memoryIdShape),
    handleDeleteMemory(ctx),
  );

  server.tool(
    'delete_all_memories',
    'Delete every memory in the given user/agent/run scope. user_id defaults to the server user.',
    registeredShape(scopeOnlyShape),
    handleDeleteAllMemories(ctx),
  );

  server.tool(
    'delete_entities',
    'Remove a user, agent or run entirely, cascading to all of its memories. Requires at least one id.',
    registeredShape(scopeOnlyShape),
    handleDeleteEntities(ctx),
  );

  server.tool(
    'list_entities',
    'List which users/agents/runs currently hold memories. Not available in self-hosted mode.',
    {},
    handleListEntities(ctx),
  );
}
