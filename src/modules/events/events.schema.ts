import { z } from 'zod';

// ============================================================================
// Request Schemas
// ============================================================================

export const CreateEventSchema = z
  .object({
    title: z.string().trim().min(1).max(100),
    description: z.string().optional().nullable(),
    maxCapacity: z.number().int().positive(),
    startTime: z.coerce.date(),
  })
  .strict();

export const EventIdParamSchema = z
  .object({
    id: z.coerce.number().int().positive(),
  })
  .strict();

// ============================================================================
// Response Schemas
// ============================================================================

export const EventResponseSchema = z.object({
  id: z.number(),
  title: z.string(),
  description: z.string().nullable(),
  maxCapacity: z.number(),
  startTime: z.date(),
  createdAt: z.date(),
});

export const EventWithCountResponseSchema = EventResponseSchema.extend({
  count: z.number(),
  isFull: z.boolean(),
});

// ============================================================================
// Types
// ============================================================================

export type CreateEventInput = z.infer<typeof CreateEventSchema>;
export type EventIdParam = z.infer<typeof EventIdParamSchema>;
export type EventResponse = z.infer<typeof EventResponseSchema>;
export type EventWithCountResponse = z.infer<typeof EventWithCountResponseSchema>;
