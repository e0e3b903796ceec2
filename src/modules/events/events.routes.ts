import { z } from 'zod';
import {
  optionalAuth,
  requireAuth,
  requireCapability,
} from '@shared/middleware/auth.middleware.js';
import { Capability } from '@modules/identity/permissions.js';
import {
  getEventWithCount,
  listEventsWithCounts,
  registeredEventIdsForOwner,
} from '@modules/reports/reports.service.js';
import { createEvent } from './events.service.js';
import {
  CreateEventSchema,
  EventIdParamSchema,
  EventResponseSchema,
  EventWithCountResponseSchema,
  type CreateEventInput,
  type EventIdParam,
} from './events.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

const EventCatalogEntrySchema = EventWithCountResponseSchema.extend({
  registered: z.boolean(),
});

export async function eventsRoutes(app: AppInstance): Promise<void> {
  // GET /api/events - Catalog with live counts
  app.get(
    '/',
    {
      onRequest: optionalAuth,
      schema: { response: { 200: z.array(EventCatalogEntrySchema) } },
    },
    async (request, reply) => {
      const entries = await listEventsWithCounts();

      // Signed-in callers see which events their participants already hold
      const registered = request.user
        ? await registeredEventIdsForOwner(request.user.id)
        : new Set<number>();

      return reply.send(
        entries.map(({ event, count, isFull }) => ({
          ...event,
          count,
          isFull,
          registered: registered.has(event.id),
        }))
      );
    }
  );

  // GET /api/events/:id - Get event
  app.get<{ Params: EventIdParam }>(
    '/:id',
    {
      schema: {
        params: EventIdParamSchema,
        response: { 200: EventWithCountResponseSchema },
      },
    },
    async (request, reply) => {
      const entry = await getEventWithCount(request.params.id);
      if (!entry) {
        throw app.httpErrors.notFound('Event not found');
      }

      return reply.send({ ...entry.event, count: entry.count, isFull: entry.isFull });
    }
  );

  // POST /api/events - Create event
  app.post<{ Body: CreateEventInput }>(
    '/',
    {
      onRequest: requireAuth,
      preHandler: requireCapability(Capability.CREATE_EVENTS),
      schema: {
        body: CreateEventSchema,
        response: { 201: EventResponseSchema },
      },
    },
    async (request, reply) => {
      const event = await createEvent(request.body);
      return reply.status(201).send(event);
    }
  );
}
