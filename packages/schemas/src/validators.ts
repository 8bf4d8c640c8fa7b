import type { ZodError } from 'zod';
import { SchemaValidationError } from '@searchgate/shared/src/utils/errors.js';
import { RuntimeEnvSchema } from './runtime-config.schema.js';
import type { RuntimeEnv } from './runtime-config.schema.js';
import { IndexSeedSchema } from './index-entry.schema.js';
import type { IndexSeed } from './index-entry.schema.js';
import { ToolDefinitionSchema } from './tool.schema.js';
import type { ToolDefinition } from './tool.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateRuntimeEnv(data: unknown): RuntimeEnv {
  const result = RuntimeEnvSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid runtime configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateIndexSeed(data: unknown): IndexSeed {
  const result = IndexSeedSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid index seed file', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateToolDefinition(data: unknown): ToolDefinition {
  const result = ToolDefinitionSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid tool definition', formatZodErrors(result.error));
  }

  return result.data;
}
