// ── Domain objects ─────────────────────────────────────────────────

export interface Scope {
  userId?: string;
  agentId?: string;
  runId?: string;
}

export interface MemoryRecord {
  id: string;
  memory: string;
  hash?: string;
  createdAt?: string;
  updatedAt?: string;
  score?: number;
  metadata?: Record<string, unknown>;
  userId?: string;
  agentId?: string;
  runId?: string;
}

export interface SearchResponse {
  results: MemoryRecord[];
  relations?: unknown[];
}

export interface MutationResult {
  message: string;
}

export interface ConversationMessage {
  role: string;
  content: string;
}

export type FilterValue = string | number | boolean;

export type MetadataFilters = Record<string, FilterValue>;

// ── Request shapes ─────────────────────────────────────────────────

export interface AddOptions {
  scope: Scope;
  metadata?: Record<string, unknown>;
}

export interface SearchOptions {
  scope: Scope;
  filters: MetadataFilters;
  limit?: number;
}

export interface ListOptions {
  scope: Scope;
  filters: MetadataFilters;
  limit: number;
}

// ── Settings ───────────────────────────────────────────────────────

export interface ServerSettings {
  defaultUserId: string;
}

// ── Dependency interfaces ──────────────────────────────────────────

export interface MemoryBackend {
  add(messages: ConversationMessage[], options: AddOptions): Promise<SearchResponse>;
  search(query: string, options: SearchOptions): Promise<SearchResponse>;
  list(options: ListOptions): Promise<MemoryRecord[]>;
  get(id: string): Promise<MemoryRecord | null>;
  update(id: string, text: string): Promise<MutationResult>;
  delete(id: string): Promise<MutationResult>;
  deleteAll(scope: Scope): Promise<MutationResult>;
  deleteEntity(scope: Scope): Promise<MutationResult>;
}
