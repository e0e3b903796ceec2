import { eq } from 'drizzle-orm';
import { db } from '@/database/client.js';
import {
  participants,
  registrations,
  type Event,
  type Participant,
  type Registration,
} from '@/database/schema.js';
import { countRegistrations, getEventById, listEvents } from '@modules/events/events.service.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import type { ExportQuery } from './reports.schema.js';

// ============================================================================
// Types
// ============================================================================

export interface EventWithCount {
  event: Event;
  count: number;
  isFull: boolean;
}

export type RegistrationWithRelations = Registration & {
  participant: Participant;
  event: Event;
};

// ============================================================================
// Event Counts
// ============================================================================

/**
 * Every event with its live registration count and fullness flag.
 */
export async function listEventsWithCounts(): Promise<EventWithCount[]> {
  const all = await listEvents();

  return Promise.all(
    all.map(async (event) => {
      const count = await countRegistrations(event.id);
      return { event, count, isFull: count >= event.maxCapacity };
    })
  );
}

export async function getEventWithCount(eventId: number): Promise<EventWithCount | null> {
  const event = await getEventById(eventId);
  if (!event) return null;

  const count = await countRegistrations(event.id);
  return { event, count, isFull: count >= event.maxCapacity };
}

// ============================================================================
// Registration Rolls
// ============================================================================

/**
 * Registrations newest first, each carrying its participant and event.
 */
export async function listRegistrations(eventId?: number): Promise<RegistrationWithRelations[]> {
  return db.query.registrations.findMany({
    where: eventId === undefined ? undefined : eq(registrations.eventId, eventId),
    with: { participant: true, event: true },
    orderBy: (r, { desc }) => [desc(r.registeredAt), desc(r.id)],
  });
}

/**
 * Events any participant owned by this user is registered for.
 */
export async function registeredEventIdsForOwner(ownerId: number): Promise<Set<number>> {
  const rows = await db
    .selectDistinct({ eventId: registrations.eventId })
    .from(registrations)
    .innerJoin(participants, eq(participants.id, registrations.participantId))
    .where(eq(participants.ownerId, ownerId));

  return new Set(rows.map((row) => row.eventId));
}

// ============================================================================
// Export
// ============================================================================

export async function exportRegistrations(
  query: ExportQuery
): Promise<{ filename: string; contentType: string; data: string }> {
  let prefix = 'all-events';

  if (query.eventId !== undefined) {
    const event = await getEventById(query.eventId);
    if (!event) {
      throw new AppError('Event not found', 404, true, ErrorCodes.EVENT_NOT_FOUND);
    }
    prefix = `event-${event.id}`;
  }

  const rows = await listRegistrations(query.eventId);

  const timestamp = new Date().toISOString().split('T')[0];
  const filename = `${prefix}-registrations-${timestamp}`;

  if (query.format === 'json') {
    return {
      filename: `${filename}.json`,
      contentType: 'application/json',
      data: JSON.stringify(rows.map(toExportRecord), null, 2),
    };
  }

  return {
    filename: `${filename}.csv`,
    contentType: 'text/csv',
    data: generateCSV(rows),
  };
}

function toExportRecord(r: RegistrationWithRelations) {
  return {
    id: r.id,
    eventId: r.eventId,
    eventTitle: r.event.title,
    eventStart: r.event.startTime.toISOString(),
    participantName: r.participant.fullName,
    naturalId: r.participant.naturalId,
    source: r.source,
    registeredAt: r.registeredAt.toISOString(),
  };
}

export function generateCSV(entries: RegistrationWithRelations[]): string {
  const headers = [
    'ID',
    'Event',
    'Event Start',
    'Participant',
    'Natural ID',
    'Source',
    'Registered At',
  ];

  const rows = entries.map((r) => [
    r.id.toString(),
    r.event.title,
    r.event.startTime.toISOString(),
    r.participant.fullName,
    r.participant.naturalId,
    r.source,
    r.registeredAt.toISOString(),
  ]);

  // Escape CSV values
  const escapeCSV = (value: string): string => {
    if (value.includes(',') || value.includes('"') || value.includes('\n')) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  };

  const csvLines = [
    headers.join(','),
    ...rows.map((row) => row.map(escapeCSV).join(',')),
  ];

  return csvLines.join('\n');
}
