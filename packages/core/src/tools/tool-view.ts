import type { Tool, ToolDefinition, ToolParamType, ToolRegistry } from './types.js';
import { toToolDefinition } from './tool-registry.js';

export interface ToolParameterView {
  readonly name: string;
  readonly type: ToolParamType;
  readonly required: boolean;
  readonly description: string;
  readonly enum?: readonly string[];
}

export interface ToolCategoryView {
  readonly name: string;
  readonly tools: readonly ToolDefinition[];
}

export type ToolsView =
  | {
      readonly kind: 'list';
      readonly tools: readonly ToolDefinition[];
      readonly categories: readonly ToolCategoryView[];
      /** Every known category, including those with no tools left to show. */
      readonly categoryCount: number;
    }
  | { readonly kind: 'detail'; readonly tool: ToolDefinition }
  | { readonly kind: 'not_found'; readonly name: string };

/**
 * The one place parameter data is read from a tool. HTML markers and JSON
 * `required` flags both come from here.
 */
export function toolParameters(tool: ToolDefinition): readonly ToolParameterView[] {
  return Object.entries(tool.input)
    .map(([name, param]) => ({
      name,
      type: param.type,
      required: param.required,
      description: param.description,
      enum: param.enum,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

function definitions(tools: readonly Tool[]): readonly ToolDefinition[] {
  return tools.map(toToolDefinition);
}

/** `name` undefined or empty means the listing. */
export function buildToolsView(registry: ToolRegistry, name?: string): ToolsView {
  if (name) {
    const tool = registry.get(name);
    return tool ? { kind: 'detail', tool: toToolDefinition(tool) } : { kind: 'not_found', name };
  }

  const categoryNames = registry.categories();
  const categories = categoryNames
    .map((category) => ({ name: category, tools: definitions(registry.byCategory(category)) }))
    .filter((category) => category.tools.length > 0);

  return {
    kind: 'list',
    tools: definitions(registry.list()),
    categories,
    categoryCount: categoryNames.length,
  };
}
