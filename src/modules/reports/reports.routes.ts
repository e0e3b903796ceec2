// ============================================================================
// Reports Module - Routes (Staff)
// ============================================================================

import { z } from 'zod';
import type { AppInstance } from '@shared/types/fastify.js';
import { requireAuth, requireCapability } from '@shared/middleware/auth.middleware.js';
import { Capability } from '@modules/identity/permissions.js';
import {
  ListRegistrationsQuerySchema,
  ExportQuerySchema,
  RegistrationRowResponseSchema,
  type ListRegistrationsQuery,
  type ExportQuery,
} from './reports.schema.js';
import { listRegistrations, exportRegistrations } from './reports.service.js';

// ============================================================================
// Route Registration
// ============================================================================

export async function reportsRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);

  // ----------------------------------------------------------------
  // GET /api/registrations - Registration roll, optionally per event
  // ----------------------------------------------------------------
  app.get<{ Querystring: ListRegistrationsQuery }>(
    '/',
    {
      schema: {
        querystring: ListRegistrationsQuerySchema,
        response: {
          200: z.array(RegistrationRowResponseSchema),
        },
      },
      preHandler: [requireCapability(Capability.READ_REGISTRATIONS)],
    },
    async (request, reply) => {
      const rows = await listRegistrations(request.query.eventId);
      return reply.send(rows);
    }
  );

  // ----------------------------------------------------------------
  // GET /api/registrations/export - Export registrations
  // ----------------------------------------------------------------
  app.get<{ Querystring: ExportQuery }>(
    '/export',
    {
      schema: {
        querystring: ExportQuerySchema,
      },
      preHandler: [requireCapability(Capability.EXPORT_REGISTRATIONS)],
    },
    async (request, reply) => {
      const result = await exportRegistrations(request.query);

      return reply
        .header('Content-Type', result.contentType)
        .header('Content-Disposition', `attachment; filename="${result.filename}"`)
        .send(result.data);
    }
  );
}
