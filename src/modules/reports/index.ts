// ============================================================================
// Reports Module - Barrel Export
// ============================================================================

// Service functions
export {
  listEventsWithCounts,
  getEventWithCount,
  listRegistrations,
  registeredEventIdsForOwner,
  exportRegistrations,
  generateCSV,
} from './reports.service.js';

// Service types
export type { EventWithCount, RegistrationWithRelations } from './reports.service.js';

// Schemas
export {
  ListRegistrationsQuerySchema,
  ExportQuerySchema,
  RegistrationRowResponseSchema,
} from './reports.schema.js';

// Types
export type {
  ListRegistrationsQuery,
  ExportQuery,
  RegistrationRowResponse,
} from './reports.schema.js';

// Routes
export { reportsRoutes } from './reports.routes.js';
