import { z } from '@hono/zod-openapi';
import { ToolDefinitionSchema } from '@searchgate/schemas/src/tool.schema.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Tools
export const ToolResponseSchema = ToolDefinitionSchema.openapi('Tool');

export const ToolListResponseSchema = z
  .object({
    tools: z.array(ToolResponseSchema),
    count: z.number().int(),
  })
  .openapi('ToolList');

export const ToolCallResponseSchema = z
  .object({
    tool: z.string(),
    result: z.unknown(),
  })
  .openapi('ToolCallResult');

// Admin
export const ApiCallRecordResponseSchema = z
  .object({
    id: z.string(),
    provider: z.string(),
    method: z.string(),
    url: z.string(),
    status: z.number().int(),
    durationMs: z.number(),
    error: z.string().optional(),
    requestBody: z.string().optional(),
    responseBody: z.string().optional(),
    recordedAt: z.string().datetime(),
  })
  .openapi('ApiCallRecord');

export const ApiLogResponseSchema = z
  .object({
    calls: z.array(ApiCallRecordResponseSchema),
    count: z.number().int(),
  })
  .openapi('ApiLog');
