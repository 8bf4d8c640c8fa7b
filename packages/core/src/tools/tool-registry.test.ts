import { describe, it, expect, vi } from 'vitest';
import { ToolError } from '@searchgate/shared/src/utils/errors.js';
import type { Tool } from './types.js';
import { TOOLS_LIST_NAME, createToolRegistry, toToolDefinition } from './tool-registry.js';

function tool(overrides: Partial<Tool> & Pick<Tool, 'name'>): Tool {
  return {
    description: `${overrides.name} description`,
    category: 'misc',
    input: {},
    ...overrides,
  };
}

describe('createToolRegistry', () => {
  it('should start with the tools.list meta tool', () => {
    const registry = createToolRegistry();
    expect(registry.list().map((t) => t.name)).toEqual([TOOLS_LIST_NAME]);
    expect(registry.categories()).toEqual(['system']);
  });

  it('should list tools sorted by name', () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'weather.now' }));
    registry.register(tool({ name: 'markets.price' }));

    expect(registry.list().map((t) => t.name)).toEqual(['markets.price', 'tools.list', 'weather.now']);
  });

  it('should reject a duplicate name', () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'news.latest' }));
    expect(() => registry.register(tool({ name: 'news.latest' }))).toThrow('Tool already registered: news.latest');
  });

  it('should reject an invalid definition', () => {
    const registry = createToolRegistry();
    expect(() => registry.register(tool({ name: 'news.latest', description: '' }))).toThrow(ToolError);
  });

  it('should return undefined for an unknown tool', () => {
    expect(createToolRegistry().get('missing')).toBeUndefined();
  });

  it('should skip empty category names', () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'a.one', category: 'news' }));
    registry.register(tool({ name: 'b.two', category: '' }));
    registry.register(tool({ name: 'c.three', category: 'markets' }));

    expect(registry.categories()).toEqual(['markets', 'news', 'system']);
  });

  it('should filter by category sorted by name', () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'news.z', category: 'news' }));
    registry.register(tool({ name: 'news.a', category: 'news' }));
    registry.register(tool({ name: 'markets.a', category: 'markets' }));

    expect(registry.byCategory('news').map((t) => t.name)).toEqual(['news.a', 'news.z']);
    expect(registry.byCategory('nothing')).toEqual([]);
  });
});

describe('ToolRegistry.call', () => {
  function registryWithEcho(): { registry: ReturnType<typeof createToolRegistry>; handler: Tool['handler'] } {
    const registry = createToolRegistry();
    const handler = vi.fn((params: Readonly<Record<string, unknown>>) => Promise.resolve({ echoed: params }));
    registry.register(
      tool({
        name: 'echo',
        input: {
          text: { type: 'string', description: 'Text', required: true },
          times: { type: 'number', description: 'Repeat count', required: false },
          mode: { type: 'string', description: 'Mode', required: false, enum: ['loud', 'quiet'] },
        },
        handler,
      }),
    );
    return { registry, handler };
  }

  it('should dispatch to the handler', async () => {
    const { registry, handler } = registryWithEcho();
    await expect(registry.call('echo', { text: 'hi' })).resolves.toEqual({ echoed: { text: 'hi' } });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should reject a missing required parameter before dispatching', async () => {
    const { registry, handler } = registryWithEcho();
    await expect(registry.call('echo', { times: 2 })).rejects.toThrow('Missing required parameter: text');
    expect(handler).not.toHaveBeenCalled();
  });

  it('should reject a parameter of the wrong type', async () => {
    const { registry } = registryWithEcho();
    await expect(registry.call('echo', { text: 'hi', times: '2' })).rejects.toThrow(
      'Invalid type for parameter times: expected number, got string',
    );
  });

  it('should reject a value outside the enum', async () => {
    const { registry } = registryWithEcho();
    await expect(registry.call('echo', { text: 'hi', mode: 'silent' })).rejects.toThrow(
      'Invalid value for parameter mode: expected one of loud, quiet',
    );
  });

  it('should reject unknown tools and tools without a handler', async () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'inert' }));

    await expect(registry.call('missing', {})).rejects.toThrow('Tool not found: missing');
    await expect(registry.call('inert', {})).rejects.toThrow('Tool has no handler: inert');
  });

  it('should list every other tool through tools.list', async () => {
    const registry = createToolRegistry();
    registry.register(tool({ name: 'news.latest', category: 'news' }));

    await expect(registry.call(TOOLS_LIST_NAME, {})).resolves.toEqual({
      tools: [{ name: 'news.latest', description: 'news.latest description', category: 'news' }],
      count: 1,
    });
  });
});

describe('toToolDefinition', () => {
  it('should drop the handler', () => {
    const definition = toToolDefinition(tool({ name: 'x', handler: () => Promise.resolve(null) }));
    expect(definition).toEqual({ name: 'x', description: 'x description', category: 'misc', input: {} });
    expect('handler' in definition).toBe(false);
  });
});
