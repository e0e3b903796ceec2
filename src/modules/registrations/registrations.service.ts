import { eq } from 'drizzle-orm';
import { db } from '@/database/client.js';
import {
  events,
  participants,
  registrations,
  type RegistrationSource,
} from '@/database/schema.js';
import { countRegistrations } from '@modules/events/events.service.js';
import {
  findPrimaryParticipant,
  getParticipantById,
  resolveOrCreateParticipant,
} from '@modules/participants/participants.service.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { isUniqueViolation, persistenceError } from '@shared/utils/db-errors.js';
import { logger } from '@shared/utils/logger.js';
import type { CallerContext } from '@shared/types/context.js';
import type { RegisterForEventInput, WalkInRegistrationInput } from './registrations.schema.js';

// ============================================================================
// Types
// ============================================================================

export const RegistrationFailure = {
  EVENT_NOT_FOUND: 'EVENT_NOT_FOUND',
  PARTICIPANT_NOT_FOUND: 'PARTICIPANT_NOT_FOUND',
  EVENT_FULL: 'EVENT_FULL',
  ALREADY_REGISTERED: 'ALREADY_REGISTERED',
} as const;

export type RegistrationFailureType =
  (typeof RegistrationFailure)[keyof typeof RegistrationFailure];

export interface RegistrationReceipt {
  id: number;
  eventId: number;
  participantId: number;
  source: RegistrationSource;
  registeredAt: Date;
}

export type RegistrationResult =
  | { ok: true; message: string; registration: RegistrationReceipt }
  | { ok: false; message: string; reason: RegistrationFailureType };

export const RegistrationMessages: Record<RegistrationFailureType | 'SUCCESS', string> = {
  SUCCESS: 'Registration successful.',
  EVENT_NOT_FOUND: 'Event not found.',
  PARTICIPANT_NOT_FOUND: 'Participant not found.',
  EVENT_FULL: 'Event is fully booked.',
  ALREADY_REGISTERED: 'Participant is already registered for this event.',
};

const UNIQUE_REGISTRATION = 'registrations_event_participant_unique';

function failure(reason: RegistrationFailureType): RegistrationResult {
  return { ok: false, reason, message: RegistrationMessages[reason] };
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Register a participant for an event.
 *
 * The event row is locked (`FOR UPDATE`) before counting, so registrations
 * for one event are serialized from the count to the insert and capacity
 * cannot be overrun. Duplicate pairs are left to the store's unique index;
 * the violation is translated once the transaction has rolled back. Any
 * other store failure is raised as a persistence error.
 */
export async function registerParticipant(
  eventId: number,
  participantId: number,
  source: RegistrationSource = 'online'
): Promise<RegistrationResult> {
  let result: RegistrationResult;

  try {
    result = await db.transaction(async (tx): Promise<RegistrationResult> => {
      const [event] = await tx
        .select({ id: events.id, maxCapacity: events.maxCapacity })
        .from(events)
        .where(eq(events.id, eventId))
        .for('update');
      if (!event) return failure(RegistrationFailure.EVENT_NOT_FOUND);

      const [participant] = await tx
        .select({ id: participants.id })
        .from(participants)
        .where(eq(participants.id, participantId));
      if (!participant) return failure(RegistrationFailure.PARTICIPANT_NOT_FOUND);

      const current = await countRegistrations(eventId, tx);
      if (current >= event.maxCapacity) return failure(RegistrationFailure.EVENT_FULL);

      const [registration] = await tx
        .insert(registrations)
        .values({ eventId, participantId, source, registeredAt: new Date() })
        .returning();

      return { ok: true, message: RegistrationMessages.SUCCESS, registration };
    });
  } catch (error) {
    if (isUniqueViolation(error, UNIQUE_REGISTRATION)) {
      result = failure(RegistrationFailure.ALREADY_REGISTERED);
    } else {
      logger.error({ err: error, eventId, participantId }, 'Registration write failed');
      throw persistenceError('register participant', error);
    }
  }

  if (result.ok) {
    logger.info(
      { eventId, participantId, registrationId: result.registration.id, source },
      'Participant registered'
    );
  } else {
    logger.info({ eventId, participantId, reason: result.reason }, 'Registration refused');
  }

  return result;
}

// ============================================================================
// Caller-facing entry points
// ============================================================================

/**
 * Pick the participant for an online registration and register them.
 *
 * Signed-in callers register one of their own participants, defaulting to
 * their primary one. Guests are resolved (or created as shadow profiles)
 * from the natural identifier and name they supply.
 */
export async function registerForCaller(
  ctx: CallerContext,
  eventId: number,
  input: RegisterForEventInput
): Promise<RegistrationResult> {
  let participantId: number;

  if (ctx.caller.kind === 'user') {
    const ownerId = ctx.caller.userId;

    if (input.participantId !== undefined) {
      const participant = await getParticipantById(input.participantId);
      if (!participant) return failure(RegistrationFailure.PARTICIPANT_NOT_FOUND);
      if (participant.ownerId !== ownerId) {
        throw new AppError(
          'This participant is not linked to your account',
          403,
          true,
          ErrorCodes.PARTICIPANT_NOT_OWNED
        );
      }
      participantId = participant.id;
    } else {
      const primary = await findPrimaryParticipant(ownerId);
      if (!primary) {
        throw new AppError(
          'No participant profile linked to your account.',
          400,
          true,
          ErrorCodes.NO_LINKED_PARTICIPANT
        );
      }
      participantId = primary.id;
    }
  } else {
    if (!input.naturalId || !input.name) {
      throw new AppError(
        'Natural ID and name are required for guest registration.',
        400,
        true,
        ErrorCodes.VALIDATION_ERROR
      );
    }
    const participant = await resolveOrCreateParticipant({
      naturalId: input.naturalId,
      name: input.name,
    });
    participantId = participant.id;
  }

  logger.debug({ requestId: ctx.requestId, eventId, participantId }, 'Online registration');
  return registerParticipant(eventId, participantId, 'online');
}

/**
 * Staff registration of someone at the door.
 */
export async function registerWalkIn(
  ctx: CallerContext,
  eventId: number,
  input: WalkInRegistrationInput
): Promise<RegistrationResult> {
  const participant = await resolveOrCreateParticipant({
    naturalId: input.naturalId,
    name: input.name,
  });

  logger.debug(
    { requestId: ctx.requestId, eventId, participantId: participant.id },
    'Walk-in registration'
  );
  return registerParticipant(eventId, participant.id, 'walkin');
}

/**
 * Turn a refused registration into the error the HTTP layer reports.
 */
export function registrationFailureToError(reason: RegistrationFailureType): AppError {
  const message = RegistrationMessages[reason];

  switch (reason) {
    case RegistrationFailure.EVENT_NOT_FOUND:
      return new AppError(message, 404, true, ErrorCodes.EVENT_NOT_FOUND);
    case RegistrationFailure.PARTICIPANT_NOT_FOUND:
      return new AppError(message, 404, true, ErrorCodes.PARTICIPANT_NOT_FOUND);
    case RegistrationFailure.EVENT_FULL:
      return new AppError(message, 409, true, ErrorCodes.EVENT_FULL);
    case RegistrationFailure.ALREADY_REGISTERED:
      return new AppError(message, 409, true, ErrorCodes.ALREADY_REGISTERED);
  }
}
