import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export const MEMORY_ASSISTANT_PROMPT = `You are using the mem0 MCP server for long-term memory management.

Quick start:
1. Store memories: use add_memory to save facts, preferences, or conversations
2. Search memories: use search_memories for semantic queries
3. List memories: use get_memories for filtered browsing (page + page_size)
4. Update/Delete: use update_memory and delete_memory once you know the memory_id

Scope:
- user_id, agent_id and run_id select whose memories you touch
- When none is given, the server's default user is used

Filter examples:
- User memories: {"AND": [{"user_id": "john"}]}
- Agent memories: {"AND": [{"agent_id": "planner"}]}
- Metadata: {"AND": [{"user_id": "john"}, {"topic": "travel"}]}

Filters match by equality only; OR and NOT are rejected.`;

export function registerPrompts(server: McpServer): void {
  server.prompt(
    'memory_assistant',
    'Get help with memory operations and best practices.',
    () => ({
      messages: [
        {
          role: 'user',
          content: { type: 'text', text: MEMORY_ASSISTANT_PROMPT },
        },
      ],
    }),
  );
}
