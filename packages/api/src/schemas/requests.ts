import { z } from '@hono/zod-openapi';
import { DEFAULT_MAX_API_CALL_RECORDS } from '@searchgate/core/src/repositories/in-memory-api-call.repository.js';

export const ToolNameParamsSchema = z.object({
  name: z.string().min(1).openapi({ example: 'search.local' }),
});

export const ToolCallRequestSchema = z
  .record(z.unknown())
  .openapi('ToolCallRequest', { example: { query: 'harbour' } });

export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export const ApiLogQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(DEFAULT_MAX_API_CALL_RECORDS).optional(),
  })
  .openapi('ApiLogQuery');
