import { z } from 'zod';

export const IndexEntrySchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  title: z.string(),
  content: z.string().optional(),
  indexedAt: z.coerce.date().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export const IndexSeedSchema = z.object({
  entries: z.array(IndexEntrySchema),
});

export type IndexEntry = z.infer<typeof IndexEntrySchema>;
export type IndexSeed = z.infer<typeof IndexSeedSchema>;
