import { pgTable, serial, text, integer, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

/**
 * Table definitions for the registration store.
 *
 * Must stay in step with schema.sql, which is what actually creates the
 * tables; these definitions only describe them to the query builder.
 */

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: text('email').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  role: text('role', { enum: ['admin', 'caregiver'] }).notNull().default('caregiver'),
  displayName: text('display_name'),
  createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
});

export const participants = pgTable(
  'participants',
  {
    id: serial('id').primaryKey(),
    // Stored trimmed and upper-cased; the only deduplication key
    naturalId: text('natural_id').notNull(),
    fullName: text('full_name').notNull(),
    ownerId: integer('owner_id').references(() => users.id),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    naturalIdUnique: uniqueIndex('participants_natural_id_unique').on(table.naturalId),
    ownerIdx: index('participants_owner_idx').on(table.ownerId),
  })
);

export const events = pgTable('events', {
  id: serial('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  maxCapacity: integer('max_capacity').notNull(),
  startTime: timestamp('start_time', { withTimezone: true, mode: 'date' }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
});

export const registrations = pgTable(
  'registrations',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id),
    participantId: integer('participant_id')
      .notNull()
      .references(() => participants.id),
    source: text('source', { enum: ['online', 'walkin'] }).notNull().default('online'),
    registeredAt: timestamp('registered_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    // One registration per participant per event, enforced by the store
    participantEventUnique: uniqueIndex('registrations_event_participant_unique').on(
      table.eventId,
      table.participantId
    ),
    registeredAtIdx: index('registrations_registered_at_idx').on(table.registeredAt),
  })
);

export const usersRelations = relations(users, ({ many }) => ({
  participants: many(participants),
}));

export const participantsRelations = relations(participants, ({ one, many }) => ({
  owner: one(users, { fields: [participants.ownerId], references: [users.id] }),
  registrations: many(registrations),
}));

export const eventsRelations = relations(events, ({ many }) => ({
  registrations: many(registrations),
}));

export const registrationsRelations = relations(registrations, ({ one }) => ({
  event: one(events, { fields: [registrations.eventId], references: [events.id] }),
  participant: one(participants, {
    fields: [registrations.participantId],
    references: [participants.id],
  }),
}));

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Participant = typeof participants.$inferSelect;
export type NewParticipant = typeof participants.$inferInsert;
export type Event = typeof events.$inferSelect;
export type NewEvent = typeof events.$inferInsert;
export type Registration = typeof registrations.$inferSelect;
export type NewRegistration = typeof registrations.$inferInsert;
export type RegistrationSource = Registration['source'];
