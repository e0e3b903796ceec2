// Services
export {
  normalizeNaturalId,
  getParticipantById,
  findParticipantByNaturalId,
  findPrimaryParticipant,
  listParticipantsForOwner,
  resolveOrCreateParticipant,
  prepareLink,
  linkParticipant,
  linkParticipantInTransaction,
  unlinkParticipant,
  LinkOutcome,
  UnlinkOutcome,
  type LinkOutcomeType,
  type UnlinkOutcomeType,
  type LinkRequest,
  type LinkResult,
  type ResolveParticipantInput,
} from './participants.service.js';

// Schemas & Types
export {
  LinkParticipantSchema,
  ParticipantIdParamSchema,
  ParticipantResponseSchema,
  LinkParticipantResponseSchema,
  type LinkParticipantInput,
  type ParticipantIdParam,
  type ParticipantResponse,
} from './participants.schema.js';

// Routes
export { participantsRoutes } from './participants.routes.js';
