import type { ToolDefinition } from '@searchgate/schemas/src/tool.schema.js';

export type { ToolDefinition, ToolParam, ToolParamType } from '@searchgate/schemas/src/tool.schema.js';

export type ToolParams = Readonly<Record<string, unknown>>;

export type ToolHandler = (params: ToolParams) => Promise<unknown>;

/**
 * A registered capability. The definition is what gets listed and
 * serialised; the handler is never exposed.
 */
export interface Tool extends ToolDefinition {
  readonly handler?: ToolHandler;
}

export interface ToolRegistry {
  register(tool: Tool): void;
  /** All tools, sorted by name. */
  list(): readonly Tool[];
  get(name: string): Tool | undefined;
  /** Unique non-empty categories, sorted. */
  categories(): readonly string[];
  byCategory(category: string): readonly Tool[];
  call(name: string, params: ToolParams): Promise<unknown>;
}
