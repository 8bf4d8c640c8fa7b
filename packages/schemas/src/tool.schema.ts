import { z } from 'zod';

export const ToolParamTypeSchema = z.enum(['string', 'number', 'boolean', 'array', 'object']);

export const ToolParamSchema = z.object({
  type: ToolParamTypeSchema,
  description: z.string(),
  required: z.boolean(),
  enum: z.array(z.string()).min(1).optional(),
});

export const ToolDefinitionSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z][a-z0-9_-]*(\.[a-z0-9_-]+)*$/, 'must be lowercase, dot-separated words'),
  description: z.string().min(1),
  category: z.string(),
  input: z.record(ToolParamSchema),
  output: z.record(ToolParamSchema).optional(),
  path: z.string().startsWith('/').optional(),
  method: z.enum(['GET', 'POST']).optional(),
});

export type ToolParamType = z.infer<typeof ToolParamTypeSchema>;
export type ToolParam = z.infer<typeof ToolParamSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
