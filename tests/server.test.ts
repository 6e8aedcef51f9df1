import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { MEMORY_ASSISTANT_PROMPT } from '../src/prompts.js';
import { createServer } from '../src/server.js';
import { MockMemoryBackend, createContext } from './mocks.js';

const textResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).length(1),
  isError: z.boolean().optional(),
});

function readText(result: unknown) {
  const parsed = textResultSchema.parse(result);
  return { text: parsed.content[0].text, isError: parsed.isError ?? false };
}

describe('MCP server', () => {
  let backend: MockMemoryBackend;
  let client: Client;

  beforeEach(async () => {
    backend = new MockMemoryBackend();
    const server = createServer(createContext(backend));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('lists every memory tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      'add_memory',
      'delete_all_memories',
      'delete_entities',
      'delete_memory',
      'get_memories',
      'get_memory',
      'list_entities',
      'search_memories',
      'update_memory',
    ]);
  });

  it('finds a memory added through the transport', async () => {
    const added = readText(
      await client.callTool({ name: 'add_memory', arguments: { text: 'likes dark roast coffee', user_id: 'u1' } }),
    );
    const id: string = JSON.parse(added.text).results[0].id;

    const found = readText(
      await client.callTool({ name: 'search_memories', arguments: { query: 'coffee', user_id: 'u1' } }),
    );

    expect(found.isError).toBe(false);
    const data = JSON.parse(found.text);
    expect(data.results).toHaveLength(1);
    expect(data.results[0].id).toBe(id);
  });

  it('returns the same list_entities payload whatever the arguments', async () => {
    const bare = readText(await client.callTool({ name: 'list_entities', arguments: {} }));
    const scoped = readText(await client.callTool({ name: 'list_entities', arguments: { user_id: 'x' } }));

    expect(bare.isError).toBe(true);
    expect(scoped).toEqual(bare);
    expect(JSON.parse(bare.text)).toEqual({
      error: {
        kind: 'UnsupportedOperation',
        message: 'list_entities is not available in self-hosted mode',
      },
    });
  });

  it('reports a missing memory as an error result', async () => {
    const result = readText(await client.callTool({ name: 'get_memory', arguments: { memory_id: 'nope' } }));

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({ error: { kind: 'NotFound', message: 'Memory nope not found' } });
  });

  it('reports a missing text argument as a ValidationError envelope', async () => {
    const result = readText(await client.callTool({ name: 'add_memory', arguments: { user_id: 'u1' } }));

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: { kind: 'ValidationError', message: 'Invalid arguments: text: Required' },
    });
    expect(backend.calls).toEqual([]);
  });

  it('reports mistyped and empty arguments as ValidationError envelopes', async () => {
    const numericId = readText(await client.callTool({ name: 'get_memory', arguments: { memory_id: 42 } }));
    const emptyQuery = readText(await client.callTool({ name: 'search_memories', arguments: { query: '' } }));

    expect(JSON.parse(numericId.text)).toEqual({
      error: { kind: 'ValidationError', message: 'Invalid arguments: memory_id: Expected string, received number' },
    });
    expect(JSON.parse(emptyQuery.text).error.kind).toBe('ValidationError');
    expect(backend.calls).toEqual([]);
  });

  it('advertises every argument name in the input schema', async () => {
    const { tools } = await client.listTools();
    const addMemory = tools.find((t) => t.name === 'add_memory');

    expect(Object.keys(addMemory?.inputSchema.properties ?? {})).toEqual([
      'text',
      'messages',
      'user_id',
      'agent_id',
      'run_id',
      'metadata',
    ]);
  });

  it('serves the memory_assistant prompt', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((p) => p.name)).toEqual(['memory_assistant']);

    const prompt = await client.getPrompt({ name: 'memory_assistant' });

    expect(prompt.messages).toEqual([
      { role: 'user', content: { type: 'text', text: MEMORY_ASSISTANT_PROMPT } },
    ]);
  });
});
