import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerPrompts } from './prompts.js';
import { registerTools, type ToolContext } from './tools.js';

export const SERVER_NAME = 'mem0';
export const SERVER_VERSION = '1.0.0';

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, ctx);
  registerPrompts(server);

  return server;
}
