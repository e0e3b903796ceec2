import { and, asc, eq, isNull } from 'drizzle-orm';
import { db } from '@/database/client.js';
import type { Executor } from '@/database/connection.js';
import { participants, type Participant } from '@/database/schema.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { isUniqueViolation, persistenceError } from '@shared/utils/db-errors.js';
import { logger } from '@shared/utils/logger.js';
import type { CallerContext } from '@shared/types/context.js';

// ============================================================================
// Types
// ============================================================================

export const LinkOutcome = {
  ALREADY_LINKED_TO_CALLER: 'already_linked_to_caller',
  ALREADY_LINKED_TO_OTHER: 'already_linked_to_other',
  LINKED_EXISTING: 'linked_existing',
  CREATED_AND_LINKED: 'created_and_linked',
} as const;

export type LinkOutcomeType = (typeof LinkOutcome)[keyof typeof LinkOutcome];

export const UnlinkOutcome = {
  NOT_FOUND: 'not_found',
  NOT_AUTHORIZED: 'not_authorized',
  UNLINKED: 'unlinked',
} as const;

export type UnlinkOutcomeType = (typeof UnlinkOutcome)[keyof typeof UnlinkOutcome];

export interface ResolveParticipantInput {
  naturalId: string;
  name: string;
  ownerId?: number | null;
}

export interface LinkRequest {
  naturalId: string;
  name: string;
}

export interface LinkResult {
  outcome: LinkOutcomeType;
  // Null when the participant belongs to someone else
  participant: Participant | null;
}

const NATURAL_ID_UNIQUE = 'participants_natural_id_unique';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Canonical form of a natural identifier: trimmed and upper-cased.
 */
export function normalizeNaturalId(raw: string): string {
  return raw.trim().toUpperCase();
}

function requireNaturalId(raw: string): string {
  const naturalId = normalizeNaturalId(raw);
  if (!naturalId) {
    throw new AppError('Natural identifier is required', 400, true, ErrorCodes.VALIDATION_ERROR, {
      field: 'naturalId',
    });
  }
  return naturalId;
}

function requireName(raw: string): string {
  const name = raw.trim();
  if (!name) {
    throw new AppError('Participant name is required', 400, true, ErrorCodes.VALIDATION_ERROR, {
      field: 'name',
    });
  }
  return name;
}

async function findByNormalizedId(naturalId: string): Promise<Participant | null> {
  const [participant] = await db
    .select()
    .from(participants)
    .where(eq(participants.naturalId, naturalId))
    .limit(1);
  return participant ?? null;
}

// ============================================================================
// Lookups
// ============================================================================

export async function getParticipantById(id: number): Promise<Participant | null> {
  const [participant] = await db
    .select()
    .from(participants)
    .where(eq(participants.id, id))
    .limit(1);
  return participant ?? null;
}

export async function findParticipantByNaturalId(raw: string): Promise<Participant | null> {
  const naturalId = normalizeNaturalId(raw);
  if (!naturalId) return null;
  return findByNormalizedId(naturalId);
}

/**
 * The participant picked when an owner registers without naming one:
 * the earliest linked profile.
 */
export async function findPrimaryParticipant(ownerId: number): Promise<Participant | null> {
  const [participant] = await db
    .select()
    .from(participants)
    .where(eq(participants.ownerId, ownerId))
    .orderBy(asc(participants.id))
    .limit(1);
  return participant ?? null;
}

export async function listParticipantsForOwner(ownerId: number): Promise<Participant[]> {
  return db
    .select()
    .from(participants)
    .where(eq(participants.ownerId, ownerId))
    .orderBy(asc(participants.fullName), asc(participants.id));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Return the participant holding this natural identifier, creating it when
 * absent.
 *
 * An existing participant comes back untouched: the name and owner given
 * here only apply to a new row. Ownership changes go through
 * {@link linkParticipant}.
 */
export async function resolveOrCreateParticipant(
  input: ResolveParticipantInput
): Promise<Participant> {
  const naturalId = requireNaturalId(input.naturalId);

  const existing = await findByNormalizedId(naturalId);
  if (existing) return existing;

  const fullName = requireName(input.name);
  try {
    const [created] = await db
      .insert(participants)
      .values({
        naturalId,
        fullName,
        ownerId: input.ownerId ?? null,
        createdAt: new Date(),
      })
      .returning();
    return created;
  } catch (error) {
    if (!isUniqueViolation(error, NATURAL_ID_UNIQUE)) {
      throw persistenceError('create participant', error);
    }

    // Another caller created it between our read and insert
    const winner = await findByNormalizedId(naturalId);
    if (!winner) {
      throw persistenceError('resolve participant', error);
    }
    return winner;
  }
}

// ============================================================================
// Ownership
// ============================================================================

/**
 * Normalize and check a link request before any transaction opens.
 */
export function prepareLink(input: LinkRequest): LinkRequest {
  return { naturalId: requireNaturalId(input.naturalId), name: requireName(input.name) };
}

/**
 * Link step run on a caller's open transaction, so it commits or rolls back
 * together with whatever else that transaction writes. Expects a request
 * from {@link prepareLink}.
 */
export async function linkParticipantInTransaction(
  tx: Executor,
  ownerId: number,
  request: LinkRequest
): Promise<LinkResult> {
  const { naturalId, name: fullName } = request;

  const [existing] = await tx
    .select()
    .from(participants)
    .where(eq(participants.naturalId, naturalId))
    .for('update');

  if (!existing) {
    const [created] = await tx
      .insert(participants)
      .values({ naturalId, fullName, ownerId, createdAt: new Date() })
      .returning();
    return { outcome: LinkOutcome.CREATED_AND_LINKED, participant: created };
  }

  if (existing.ownerId === ownerId) {
    return { outcome: LinkOutcome.ALREADY_LINKED_TO_CALLER, participant: existing };
  }
  if (existing.ownerId !== null) {
    return { outcome: LinkOutcome.ALREADY_LINKED_TO_OTHER, participant: null };
  }

  const [linked] = await tx
    .update(participants)
    .set({ ownerId })
    .where(and(eq(participants.id, existing.id), isNull(participants.ownerId)))
    .returning();
  if (!linked) {
    return { outcome: LinkOutcome.ALREADY_LINKED_TO_OTHER, participant: null };
  }
  return { outcome: LinkOutcome.LINKED_EXISTING, participant: linked };
}

/**
 * Attach the participant with this natural identifier to the calling user,
 * creating it if needed. A participant owned by someone else is left alone.
 */
export async function linkParticipant(
  ctx: CallerContext,
  input: LinkRequest
): Promise<LinkResult> {
  if (ctx.caller.kind !== 'user') {
    throw new AppError('Authentication required', 401, true, ErrorCodes.UNAUTHORIZED);
  }
  const ownerId = ctx.caller.userId;
  const request = prepareLink(input);

  let result: LinkResult;
  try {
    result = await db.transaction((tx) => linkParticipantInTransaction(tx, ownerId, request));
  } catch (error) {
    throw persistenceError('link participant', error);
  }

  logger.info(
    { requestId: ctx.requestId, ownerId, participantId: result.participant?.id, outcome: result.outcome },
    'Participant link processed'
  );
  return result;
}

/**
 * Detach a participant from its owner. Only the current owner may do this;
 * the participant and its registrations stay in place.
 */
export async function unlinkParticipant(
  ctx: CallerContext,
  participantId: number
): Promise<UnlinkOutcomeType> {
  const participant = await getParticipantById(participantId);
  if (!participant) return UnlinkOutcome.NOT_FOUND;

  if (ctx.caller.kind !== 'user' || participant.ownerId !== ctx.caller.userId) {
    return UnlinkOutcome.NOT_AUTHORIZED;
  }

  const ownerId = ctx.caller.userId;
  let updated: { id: number }[];
  try {
    updated = await db
      .update(participants)
      .set({ ownerId: null })
      .where(and(eq(participants.id, participantId), eq(participants.ownerId, ownerId)))
      .returning({ id: participants.id });
  } catch (error) {
    throw persistenceError('unlink participant', error);
  }

  // Ownership moved between the read and the update
  if (updated.length === 0) return UnlinkOutcome.NOT_AUTHORIZED;

  logger.info({ requestId: ctx.requestId, ownerId, participantId }, 'Participant unlinked');
  return UnlinkOutcome.UNLINKED;
}
