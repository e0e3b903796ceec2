// ============================================================================
// Registrations Module - Barrel Export
// ============================================================================

// Service functions
export {
  registerParticipant,
  registerForCaller,
  registerWalkIn,
  registrationFailureToError,
  RegistrationFailure,
  RegistrationMessages,
} from './registrations.service.js';

// Service types
export type {
  RegistrationFailureType,
  RegistrationReceipt,
  RegistrationResult,
} from './registrations.service.js';

// Schemas
export {
  RegistrationSourceSchema,
  RegisterForEventSchema,
  WalkInRegistrationSchema,
  RegistrationReceiptSchema,
  RegistrationResponseSchema,
} from './registrations.schema.js';

// Types
export type {
  RegisterForEventInput,
  WalkInRegistrationInput,
  RegistrationResponse,
} from './registrations.schema.js';

// Routes
export { registrationsRoutes } from './registrations.routes.js';
