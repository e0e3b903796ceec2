import { getAuthUser, getCallerContext, requireAuth } from '@shared/middleware/auth.middleware.js';
import { issueToken } from '@shared/services/token.service.js';
import { listParticipantsForOwner } from '@modules/participants/participants.service.js';
import { authenticate, registerAccount } from './users.service.js';
import {
  RegisterAccountSchema,
  LoginSchema,
  AuthResponseSchema,
  RegisterAccountResponseSchema,
  MeResponseSchema,
  type RegisterAccountInput,
  type LoginInput,
} from './users.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function authRoutes(app: AppInstance): Promise<void> {
  // POST /api/auth/register - Create account
  app.post<{ Body: RegisterAccountInput }>(
    '/register',
    {
      schema: {
        body: RegisterAccountSchema,
        response: { 201: RegisterAccountResponseSchema },
      },
    },
    async (request, reply) => {
      const { user, participantLink } = await registerAccount(
        getCallerContext(request),
        request.body
      );
      return reply.status(201).send({ user, token: issueToken(user), participantLink });
    }
  );

  // POST /api/auth/login - Exchange credentials for a token
  app.post<{ Body: LoginInput }>(
    '/login',
    {
      schema: {
        body: LoginSchema,
        response: { 200: AuthResponseSchema },
      },
    },
    async (request, reply) => {
      const user = await authenticate(request.body.email, request.body.password);
      return reply.send({ user, token: issueToken(user) });
    }
  );

  // GET /api/auth/me - Current user and their participants
  app.get(
    '/me',
    {
      onRequest: requireAuth,
      schema: {
        response: { 200: MeResponseSchema },
      },
    },
    async (request, reply) => {
      const user = getAuthUser(request);
      const participants = await listParticipantsForOwner(user.id);
      return reply.send({ user, participants });
    }
  );
}
