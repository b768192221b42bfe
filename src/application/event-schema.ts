import { z } from 'zod';

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Zod schema for one event posted by a remote call site.
 *
 * - `category` is optional, `action` is required.
 * - `parameters` must be a flat object of scalars; nested values are
 *   rejected since backends publish a flat mapping.
 */
export const eventSchema = z.object({
  category: z.string().min(1).max(255).optional(),
  action: z.string().min(1).max(255),
  parameters: z.record(z.string(), attributeValueSchema).default({}),
});

export type EventInput = z.infer<typeof eventSchema>;

export const MAX_BATCH_SIZE = 500;

export const eventBatchSchema = z
  .array(eventSchema)
  .min(1, 'Batch must contain at least one event')
  .max(MAX_BATCH_SIZE, `Batch must contain at most ${MAX_BATCH_SIZE} events`);
