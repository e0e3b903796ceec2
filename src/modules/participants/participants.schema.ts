import { z } from 'zod';

// ============================================================================
// Request Schemas
// ============================================================================

export const LinkParticipantSchema = z
  .object({
    naturalId: z.string().trim().min(1).max(20),
    name: z.string().trim().min(1).max(100),
  })
  .strict();

export const ParticipantIdParamSchema = z
  .object({
    id: z.coerce.number().int().positive(),
  })
  .strict();

// ============================================================================
// Response Schemas
// ============================================================================

export const ParticipantResponseSchema = z.object({
  id: z.number(),
  naturalId: z.string(),
  fullName: z.string(),
  ownerId: z.number().nullable(),
  createdAt: z.date(),
});

export const LinkParticipantResponseSchema = z.object({
  outcome: z.enum([
    'already_linked_to_caller',
    'already_linked_to_other',
    'linked_existing',
    'created_and_linked',
  ]),
  participant: ParticipantResponseSchema.nullable(),
});

// ============================================================================
// Types
// ============================================================================

export type LinkParticipantInput = z.infer<typeof LinkParticipantSchema>;
export type ParticipantIdParam = z.infer<typeof ParticipantIdParamSchema>;
export type ParticipantResponse = z.infer<typeof ParticipantResponseSchema>;
