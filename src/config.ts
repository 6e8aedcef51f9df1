import { z } from 'zod';
import { ConfigError } from './errors.js';

const TRUTHY = new Set(['1', 'true', 'yes']);

const flagSchema = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? false : TRUTHY.has(value.trim().toLowerCase())));

const portSchema = z.coerce.number().int().min(1).max(65535);

// Empty strings count as unset so that `FOO=` in a .env file falls back
// to the default.
function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return cleaned;
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is required (used by both the LLM and the embedder)' }),
  OPENAI_LLM_MODEL: z.string().default('gpt-4.1-nano-2025-04-14'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMS: z.coerce.number().int().positive().default(1536),

  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: portSchema.default(8432),
  POSTGRES_DB: z.string().default('postgres'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_COLLECTION: z.string().default('memories'),

  NEO4J_URI: z.string().default('bolt://localhost:8687'),
  NEO4J_USERNAME: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().default('mem0graph'),

  MEM0_DEFAULT_USER_ID: z.string().default('mem0-mcp'),
  MEM0_ENABLE_GRAPH_DEFAULT: flagSchema,
  MEM0_HISTORY_DB_PATH: z.string().optional(),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  openai: {
    apiKey: string;
    llmModel: string;
    embeddingModel: string;
    embeddingDims: number;
  };
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    collection: string;
  };
  neo4j: {
    url: string;
    username: string;
    password: string;
  };
  defaultUserId: string;
  enableGraph: boolean;
  historyDbPath?: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Reads the server configuration from an environment map. Call once at
 * start-up and pass the result down.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    openai: {
      apiKey: e.OPENAI_API_KEY,
      llmModel: e.OPENAI_LLM_MODEL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      embeddingDims: e.EMBEDDING_DIMS,
    },
    postgres: {
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
      collection: e.POSTGRES_COLLECTION,
    },
    neo4j: {
      url: e.NEO4J_URI,
      username: e.NEO4J_USERNAME,
      password: e.NEO4J_PASSWORD,
    },
    defaultUserId: e.MEM0_DEFAULT_USER_ID,
    enableGraph: e.MEM0_ENABLE_GRAPH_DEFAULT,
    historyDbPath: e.MEM0_HISTORY_DB_PATH,
    logLevel: e.LOG_LEVEL,
  };
}
