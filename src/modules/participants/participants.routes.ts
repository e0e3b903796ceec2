import { z } from 'zod';
import {
  getAuthUser,
  getCallerContext,
  requireAuth,
  requireCapability,
} from '@shared/middleware/auth.middleware.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { Capability } from '@modules/identity/permissions.js';
import {
  linkParticipant,
  listParticipantsForOwner,
  unlinkParticipant,
  LinkOutcome,
  UnlinkOutcome,
} from './participants.service.js';
import {
  LinkParticipantSchema,
  LinkParticipantResponseSchema,
  ParticipantIdParamSchema,
  ParticipantResponseSchema,
  type LinkParticipantInput,
  type ParticipantIdParam,
} from './participants.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function participantsRoutes(app: AppInstance): Promise<void> {
  // All routes manage the caller's own roster
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireCapability(Capability.MANAGE_PARTICIPANTS));

  // GET /api/participants - Caller's participants
  app.get(
    '/',
    {
      schema: { response: { 200: z.array(ParticipantResponseSchema) } },
    },
    async (request, reply) => {
      const user = getAuthUser(request);
      const participants = await listParticipantsForOwner(user.id);
      return reply.send(participants);
    }
  );

  // POST /api/participants/link - Link (or create) a participant by natural ID
  app.post<{ Body: LinkParticipantInput }>(
    '/link',
    {
      schema: {
        body: LinkParticipantSchema,
        response: { 200: LinkParticipantResponseSchema, 201: LinkParticipantResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await linkParticipant(getCallerContext(request), request.body);

      if (result.outcome === LinkOutcome.ALREADY_LINKED_TO_OTHER) {
        throw new AppError(
          'This participant is already linked to another account',
          409,
          true,
          ErrorCodes.PARTICIPANT_LINKED_TO_OTHER
        );
      }

      const status = result.outcome === LinkOutcome.CREATED_AND_LINKED ? 201 : 200;
      return reply.status(status).send(result);
    }
  );

  // DELETE /api/participants/:id - Unlink a participant from the caller
  app.delete<{ Params: ParticipantIdParam }>(
    '/:id',
    {
      schema: { params: ParticipantIdParamSchema },
    },
    async (request, reply) => {
      const outcome = await unlinkParticipant(getCallerContext(request), request.params.id);

      if (outcome === UnlinkOutcome.NOT_FOUND) {
        throw app.httpErrors.notFound('Participant not found');
      }
      if (outcome === UnlinkOutcome.NOT_AUTHORIZED) {
        throw new AppError(
          'Only the linked account can unlink this participant',
          403,
          true,
          ErrorCodes.PARTICIPANT_NOT_OWNED
        );
      }

      return reply.status(204).send();
    }
  );
}
