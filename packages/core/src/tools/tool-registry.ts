import { createChildLogger } from '@searchgate/shared/src/logger.js';
import { SchemaValidationError, ToolError } from '@searchgate/shared/src/utils/errors.js';
import { validateToolDefinition } from '@searchgate/schemas/src/validators.js';
import type { Tool, ToolDefinition, ToolParamType, ToolParams, ToolRegistry } from './types.js';

const log = createChildLogger('tools:registry');

export const TOOLS_LIST_NAME = 'tools.list';

function byName(a: Tool, b: Tool): number {
  return a.name.localeCompare(b.name);
}

function matchesType(value: unknown, type: ToolParamType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/** Strips the handler so a tool can be serialised. */
export function toToolDefinition(tool: Tool): ToolDefinition {
  const { handler: _handler, ...definition } = tool;
  return definition;
}

function validateParams(tool: Tool, params: ToolParams): void {
  for (const [name, param] of Object.entries(tool.input)) {
    const value = params[name];
    if (value === undefined) {
      if (param.required) {
        throw new ToolError(`Missing required parameter: ${name}`);
      }
      continue;
    }
    if (!matchesType(value, param.type)) {
      throw new ToolError(
        `Invalid type for parameter ${name}: expected ${param.type}, got ${describeValue(value)}`,
      );
    }
    if (param.enum && (typeof value !== 'string' || !param.enum.includes(value))) {
      throw new ToolError(`Invalid value for parameter ${name}: expected one of ${param.enum.join(', ')}`);
    }
  }
}

/**
 * In-memory tool catalog. Comes with the `tools.list` meta tool already
 * registered.
 */
export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  const registry: ToolRegistry = {
    register(tool: Tool): void {
      try {
        validateToolDefinition(toToolDefinition(tool));
      } catch (error) {
        if (error instanceof SchemaValidationError) {
          throw new ToolError(`Invalid tool ${tool.name}: ${error.validationErrors.join('; ')}`, error);
        }
        throw error;
      }
      if (tools.has(tool.name)) {
        throw new ToolError(`Tool already registered: ${tool.name}`);
      }
      tools.set(tool.name, tool);
      log.debug({ tool: tool.name, category: tool.category }, 'Registered tool');
    },

    list(): readonly Tool[] {
      return [...tools.values()].sort(byName);
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    categories(): readonly string[] {
      const unique = new Set<string>();
      for (const tool of tools.values()) {
        if (tool.category !== '') {
          unique.add(tool.category);
        }
      }
      return [...unique].sort();
    },

    byCategory(category: string): readonly Tool[] {
      return [...tools.values()].filter((tool) => tool.category === category).sort(byName);
    },

    async call(name: string, params: ToolParams): Promise<unknown> {
      const tool = tools.get(name);
      if (!tool) {
        throw new ToolError(`Tool not found: ${name}`);
      }
      if (!tool.handler) {
        throw new ToolError(`Tool has no handler: ${name}`);
      }
      validateParams(tool, params);

      log.info({ tool: name }, 'Calling tool');
      return tool.handler(params);
    },
  };

  registry.register({
    name: TOOLS_LIST_NAME,
    description: 'List all available tools and their descriptions',
    category: 'system',
    input: {},
    output: {
      tools: { type: 'array', description: 'List of available tools', required: true },
      count: { type: 'number', description: 'Number of tools listed', required: true },
    },
    handler: () => {
      const summaries = registry
        .list()
        .filter((tool) => tool.name !== TOOLS_LIST_NAME)
        .map(({ name, description, category }) => ({ name, description, category }));
      return Promise.resolve({ tools: summaries, count: summaries.length });
    },
  });

  return registry;
}
