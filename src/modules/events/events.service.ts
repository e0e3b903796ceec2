import { asc, count, eq } from 'drizzle-orm';
import { db } from '@/database/client.js';
import type { Executor } from '@/database/connection.js';
import { events, registrations, type Event } from '@/database/schema.js';
import type { CreateEventInput } from './events.schema.js';

/**
 * Create a new event. Events are not edited after creation.
 */
export async function createEvent(input: CreateEventInput): Promise<Event> {
  const [event] = await db
    .insert(events)
    .values({
      title: input.title,
      description: input.description ?? null,
      maxCapacity: input.maxCapacity,
      startTime: input.startTime,
      createdAt: new Date(),
    })
    .returning();
  return event;
}

/**
 * Get event by ID.
 */
export async function getEventById(id: number): Promise<Event | null> {
  const [event] = await db.select().from(events).where(eq(events.id, id)).limit(1);
  return event ?? null;
}

/**
 * List all events, soonest first.
 */
export async function listEvents(): Promise<Event[]> {
  return db.select().from(events).orderBy(asc(events.startTime), asc(events.id));
}

/**
 * Live registration count for an event. Pass an open transaction as
 * `executor` to count inside it.
 */
export async function countRegistrations(
  eventId: number,
  executor: Executor = db
): Promise<number> {
  const [row] = await executor
    .select({ value: count() })
    .from(registrations)
    .where(eq(registrations.eventId, eventId));
  return row?.value ?? 0;
}
