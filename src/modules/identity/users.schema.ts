import { z } from 'zod';
import { UserRole } from './permissions.js';
import { ParticipantResponseSchema } from '@modules/participants/participants.schema.js';

// ============================================================================
// Request Schemas
// ============================================================================

export const RegisterAccountSchema = z
  .object({
    email: z.string().trim().email(),
    password: z.string().min(8),
    name: z.string().trim().min(1).max(100),
    role: z.enum([UserRole.ADMIN, UserRole.CAREGIVER]).default(UserRole.CAREGIVER),
    accessCode: z.string().optional(),
    naturalId: z.string().trim().max(20).optional(),
  })
  .strict();

export const LoginSchema = z
  .object({
    email: z.string().trim().email(),
    password: z.string().min(1),
  })
  .strict();

// ============================================================================
// Response Schemas
// ============================================================================

export const UserResponseSchema = z.object({
  id: z.number(),
  email: z.string().email(),
  role: z.enum([UserRole.ADMIN, UserRole.CAREGIVER]),
  displayName: z.string().nullable(),
  createdAt: z.date(),
});

export const AuthResponseSchema = z.object({
  user: UserResponseSchema,
  token: z.string(),
});

export const RegisterAccountResponseSchema = AuthResponseSchema.extend({
  participantLink: z
    .enum(['already_linked_to_caller', 'already_linked_to_other', 'linked_existing', 'created_and_linked'])
    .nullable(),
});

export const MeResponseSchema = z.object({
  user: UserResponseSchema,
  participants: z.array(ParticipantResponseSchema),
});

// ============================================================================
// Types
// ============================================================================

export type RegisterAccountInput = z.infer<typeof RegisterAccountSchema>;
export type LoginInput = z.infer<typeof LoginSchema>;
export type UserResponse = z.infer<typeof UserResponseSchema>;
