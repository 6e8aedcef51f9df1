#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createMem0Client, Mem0MemoryBackend } from './mem0-backend.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  // ── Compose dependencies ──
  const backend = new Mem0MemoryBackend(createMem0Client(config));
  const server = createServer({
    backend,
    settings: { defaultUserId: config.defaultUserId },
    logger: logger.child({ component: 'tools' }),
  });

  // ── Start MCP transport ──
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    { defaultUserId: config.defaultUserId, graph: config.enableGraph },
    'mem0 MCP server listening on stdio',
  );
}

main().catch((err: unknown) => {
  // The configured logger may not exist yet, so report through a default one.
  createLogger().fatal({ err }, 'server failed to start');
  process.exit(1);
});
