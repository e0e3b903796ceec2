import { z } from 'zod';

// ============================================================================
// Request Schemas
// ============================================================================

export const RegistrationSourceSchema = z.enum(['online', 'walkin']);

/**
 * Signed-in callers may name one of their participants (or fall back to
 * their primary one); guests identify the participant directly.
 */
export const RegisterForEventSchema = z
  .object({
    participantId: z.number().int().positive().optional(),
    naturalId: z.string().trim().min(1).max(20).optional(),
    name: z.string().trim().min(1).max(100).optional(),
  })
  .strict();

export const WalkInRegistrationSchema = z
  .object({
    naturalId: z.string().trim().min(1).max(20),
    name: z.string().trim().min(1).max(100),
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

export const RegistrationReceiptSchema = z.object({
  id: z.number(),
  eventId: z.number(),
  participantId: z.number(),
  source: RegistrationSourceSchema,
  registeredAt: z.date(),
});

export const RegistrationResponseSchema = z.object({
  message: z.string(),
  registration: RegistrationReceiptSchema,
});

// ============================================================================
// Types
// ============================================================================

export type RegisterForEventInput = z.infer<typeof RegisterForEventSchema>;
export type WalkInRegistrationInput = z.infer<typeof WalkInRegistrationSchema>;
export type EventIdParam = z.infer<typeof EventIdParamSchema>;
export type RegistrationResponse = z.infer<typeof RegistrationResponseSchema>;
