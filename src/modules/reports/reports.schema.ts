import { z } from 'zod';

// ============================================================================
// Query Schemas
// ============================================================================

export const ListRegistrationsQuerySchema = z
  .object({
    eventId: z.coerce.number().int().positive().optional(),
  })
  .strict();

export const ExportQuerySchema = z
  .object({
    eventId: z.coerce.number().int().positive().optional(),
    format: z.enum(['csv', 'json']).default('csv'),
  })
  .strict();

// ============================================================================
// Response Schemas
// ============================================================================

export const RegistrationRowResponseSchema = z.object({
  id: z.number(),
  eventId: z.number(),
  participantId: z.number(),
  source: z.enum(['online', 'walkin']),
  registeredAt: z.date(),
  participant: z.object({
    id: z.number(),
    naturalId: z.string(),
    fullName: z.string(),
    ownerId: z.number().nullable(),
  }),
  event: z.object({
    id: z.number(),
    title: z.string(),
    startTime: z.date(),
    maxCapacity: z.number(),
  }),
});

// ============================================================================
// Types
// ============================================================================

export type ListRegistrationsQuery = z.infer<typeof ListRegistrationsQuerySchema>;
export type ExportQuery = z.infer<typeof ExportQuerySchema>;
export type RegistrationRowResponse = z.infer<typeof RegistrationRowResponseSchema>;
