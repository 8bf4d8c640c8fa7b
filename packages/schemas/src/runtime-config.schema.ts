import { z } from 'zod';

export const RuntimeEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SEARCHGATE_SESSION_SECRET: z.string().min(8),
  SEARCHGATE_GCP_PROJECT_ID: z.string().min(1).optional(),
  SEARCHGATE_MOCK_SEARCH: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  SEARCHGATE_INDEX_FILE: z.string().min(1).optional(),
  CREDIT_COST_WEB_SEARCH: z.coerce.number().int().positive().default(5),
  FREE_DAILY_SEARCHES: z.coerce.number().int().min(0).default(10),
});

export type RuntimeEnv = z.infer<typeof RuntimeEnvSchema>;
