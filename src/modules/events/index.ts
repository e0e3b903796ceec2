// Services
export { createEvent, getEventById, listEvents, countRegistrations } from './events.service.js';

// Schemas & Types
export {
  CreateEventSchema,
  EventIdParamSchema,
  EventResponseSchema,
  EventWithCountResponseSchema,
  type CreateEventInput,
  type EventIdParam,
  type EventResponse,
  type EventWithCountResponse,
} from './events.schema.js';

// Routes
export { eventsRoutes } from './events.routes.js';
