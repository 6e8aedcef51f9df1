import { Memory } from 'mem0ai/oss';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { NotFoundError, ValidationError } from './errors.js';
import { hasScope } from './scope.js';
import type {
  AddOptions,
  ConversationMessage,
  ListOptions,
  MemoryBackend,
  MemoryRecord,
  MetadataFilters,
  MutationResult,
  Scope,
  SearchOptions,
  SearchResponse,
} from './types.js';

// ── mem0 client types ──────────────────────────────────────────────
// Derived from the Memory class so the adapter tracks the library's
// own signatures.

export type Mem0Config = NonNullable<ConstructorParameters<typeof Memory>[0]>;

export type Mem0Client = Pick<
  Memory,
  'add' | 'search' | 'get' | 'getAll' | 'update' | 'delete' | 'deleteAll'
>;

type Mem0Item = NonNullable<Awaited<ReturnType<Memory['get']>>>;

type Mem0SearchResult = Awaited<ReturnType<Memory['search']>>;

// ── Configuration ──────────────────────────────────────────────────

/**
 * Maps the server configuration onto mem0's self-hosted config:
 * pgvector for vectors, OpenAI for both LLM and embedder, and Neo4j
 * only when the graph store is enabled.
 */
export function buildMem0Config(config: AppConfig): Mem0Config {
  const { openai, postgres, neo4j } = config;

  const mem0Config: Mem0Config = {
    version: 'v1.1',
    embedder: {
      provider: 'openai',
      config: {
        apiKey: openai.apiKey,
        model: openai.embeddingModel,
      },
    },
    vectorStore: {
      provider: 'pgvector',
      config: {
        collectionName: postgres.collection,
        dimension: openai.embeddingDims,
        embeddingModelDims: openai.embeddingDims,
        host: postgres.host,
        port: postgres.port,
        dbname: postgres.database,
        user: postgres.user,
        password: postgres.password,
      },
    },
    llm: {
      provider: 'openai',
      config: {
        apiKey: openai.apiKey,
        model: openai.llmModel,
      },
    },
    enableGraph: config.enableGraph,
  };

  if (config.enableGraph) {
    mem0Config.graphStore = {
      provider: 'neo4j',
      config: {
        url: neo4j.url,
        username: neo4j.username,
        password: neo4j.password,
      },
    };
  }
  if (config.historyDbPath) {
    mem0Config.historyDbPath = config.historyDbPath;
  }
  return mem0Config;
}

export function createMem0Client(config: AppConfig): Memory {
  return new Memory(buildMem0Config(config));
}

// ── Record mapping ─────────────────────────────────────────────────

// mem0 spreads the owning ids onto each item at runtime without
// declaring them on its item type.
function scopeOf(item: object): Scope {
  const scope: Scope = {};
  for (const [key, value] of Object.entries(item)) {
    if (typeof value !== 'string') continue;
    if (key === 'userId' || key === 'agentId' || key === 'runId') {
      scope[key] = value;
    }
  }
  return scope;
}

function toRecord(item: Mem0Item): MemoryRecord {
  return {
    id: item.id,
    memory: item.memory,
    hash: item.hash,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
    score: item.score,
    metadata: item.metadata,
    ...scopeOf(item),
  };
}

function toSearchResponse(result: Mem0SearchResult): SearchResponse {
  const response: SearchResponse = { results: result.results.map(toRecord) };
  if (result.relations !== undefined) {
    response.relations = result.relations;
  }
  return response;
}

function matchesMetadata(record: MemoryRecord, filters: MetadataFilters): boolean {
  return Object.entries(filters).every(([key, value]) => record.metadata?.[key] === value);
}

// pgvector keys memories on a UUID column and rejects any other id
// before the lookup runs.
const memoryIdSchema = z.string().uuid();

function isMemoryId(id: string): boolean {
  return memoryIdSchema.safeParse(id).success;
}

function requireScope(scope: Scope, operation: string): Scope {
  if (!hasScope(scope)) {
    throw new ValidationError(`${operation} requires at least one of user_id, agent_id or run_id`);
  }
  return scope;
}

// ── Mem0MemoryBackend ──────────────────────────────────────────────

export class Mem0MemoryBackend implements MemoryBackend {
  constructor(private readonly client: Mem0Client) {}

  async add(messages: ConversationMessage[], options: AddOptions): Promise<SearchResponse> {
    const result = await this.client.add(messages, {
      ...requireScope(options.scope, 'add'),
      metadata: options.metadata,
    });
    return toSearchResponse(result);
  }

  async search(query: string, options: SearchOptions): Promise<SearchResponse> {
    // mem0 writes the scope ids into the filters object it is given.
    const result = await this.client.search(query, {
      ...requireScope(options.scope, 'search'),
      limit: options.limit,
      filters: { ...options.filters },
    });
    return toSearchResponse(result);
  }

  // getAll has no metadata filtering, so filters apply to the fetched page.
  async list(options: ListOptions): Promise<MemoryRecord[]> {
    const result = await this.client.getAll({
      ...requireScope(options.scope, 'list'),
      limit: options.limit,
    });
    return result.results
      .map(toRecord)
      .filter((record) => matchesMetadata(record, options.filters));
  }

  async get(id: string): Promise<MemoryRecord | null> {
    if (!isMemoryId(id)) return null;
    const item = await this.client.get(id);
    return item ? toRecord(item) : null;
  }

  async update(id: string, text: string): Promise<MutationResult> {
    await this.requireExisting(id);
    return this.client.update(id, text);
  }

  async delete(id: string): Promise<MutationResult> {
    await this.requireExisting(id);
    return this.client.delete(id);
  }

  async deleteAll(scope: Scope): Promise<MutationResult> {
    return this.client.deleteAll(requireScope(scope, 'deleteAll'));
  }

  // Self-hosted mem0 keeps no entity table; an entity exists only
  // through its memories, so removing them removes the entity.
  async deleteEntity(scope: Scope): Promise<MutationResult> {
    return this.client.deleteAll(requireScope(scope, 'deleteEntity'));
  }

  private async requireExisting(id: string): Promise<void> {
    if (!(await this.get(id))) throw NotFoundError.memory(id);
  }
}
