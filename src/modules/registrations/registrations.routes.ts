import {
  getCallerContext,
  optionalAuth,
  requireAuth,
  requireCapability,
} from '@shared/middleware/auth.middleware.js';
import { Capability } from '@modules/identity/permissions.js';
import {
  registerForCaller,
  registerWalkIn,
  registrationFailureToError,
} from './registrations.service.js';
import {
  EventIdParamSchema,
  RegisterForEventSchema,
  WalkInRegistrationSchema,
  RegistrationResponseSchema,
  type EventIdParam,
  type RegisterForEventInput,
  type WalkInRegistrationInput,
} from './registrations.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Registration Routes (mounted under /api/events)
// ============================================================================

export async function registrationsRoutes(app: AppInstance): Promise<void> {
  // POST /api/events/:id/register - Online registration (guest or signed in)
  app.post<{ Params: EventIdParam; Body: RegisterForEventInput }>(
    '/:id/register',
    {
      onRequest: optionalAuth,
      schema: {
        params: EventIdParamSchema,
        body: RegisterForEventSchema,
        response: { 201: RegistrationResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await registerForCaller(
        getCallerContext(request),
        request.params.id,
        request.body
      );

      if (!result.ok) {
        throw registrationFailureToError(result.reason);
      }

      return reply.status(201).send({ message: result.message, registration: result.registration });
    }
  );

  // POST /api/events/:id/walkin - Staff registers someone at the door
  app.post<{ Params: EventIdParam; Body: WalkInRegistrationInput }>(
    '/:id/walkin',
    {
      onRequest: requireAuth,
      preHandler: requireCapability(Capability.REGISTER_WALKIN),
      schema: {
        params: EventIdParamSchema,
        body: WalkInRegistrationSchema,
        response: { 201: RegistrationResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await registerWalkIn(
        getCallerContext(request),
        request.params.id,
        request.body
      );

      if (!result.ok) {
        throw registrationFailureToError(result.reason);
      }

      return reply.status(201).send({ message: result.message, registration: result.registration });
    }
  );
}
