import { describe, it, expect } from 'vitest';
import '../../../tests/mocks/database.js';
import {
  createTestEvent,
  createTestParticipant,
  createTestRegistration,
  createTestUser,
} from '../../../tests/helpers/factories.js';
import {
  exportRegistrations,
  generateCSV,
  getEventWithCount,
  listEventsWithCounts,
  listRegistrations,
  registeredEventIdsForOwner,
  type RegistrationWithRelations,
} from './reports.service.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

describe('Reports Service', () => {
  // ==========================================================================
  // Event counts
  // ==========================================================================

  describe('listEventsWithCounts', () => {
    it('should attach live counts and fullness to every event', async () => {
      const full = await createTestEvent({
        title: 'Full',
        maxCapacity: 1,
        startTime: new Date('2026-06-01T00:00:00.000Z'),
      });
      const open = await createTestEvent({
        title: 'Open',
        maxCapacity: 3,
        startTime: new Date('2026-06-02T00:00:00.000Z'),
      });
      const p = await createTestParticipant();
      await createTestRegistration(full.id, p.id);
      await createTestRegistration(open.id, p.id);

      const entries = await listEventsWithCounts();

      expect(entries.map((e) => [e.event.id, e.count, e.isFull])).toEqual([
        [full.id, 1, true],
        [open.id, 1, false],
      ]);
    });

    it('should return an empty list when there are no events', async () => {
      expect(await listEventsWithCounts()).toEqual([]);
    });
  });

  describe('getEventWithCount', () => {
    it('should return null for an unknown event', async () => {
      expect(await getEventWithCount(9999)).toBeNull();
    });

    it('should count registrations for one event', async () => {
      const event = await createTestEvent({ maxCapacity: 10 });
      const p = await createTestParticipant();
      await createTestRegistration(event.id, p.id);

      const entry = await getEventWithCount(event.id);

      expect(entry?.count).toBe(1);
      expect(entry?.isFull).toBe(false);
    });
  });

  // ==========================================================================
  // Registration rolls
  // ==========================================================================

  describe('listRegistrations', () => {
    it('should return registrations newest first with participant and event', async () => {
      const event = await createTestEvent({ title: 'Chess Night' });
      const older = await createTestParticipant({ fullName: 'Older Entry' });
      const newer = await createTestParticipant({ fullName: 'Newer Entry' });
      await createTestRegistration(event.id, older.id, {
        registeredAt: new Date('2026-01-01T10:00:00.000Z'),
      });
      await createTestRegistration(event.id, newer.id, {
        registeredAt: new Date('2026-01-02T10:00:00.000Z'),
      });

      const rows = await listRegistrations();

      expect(rows.map((r) => r.participant.fullName)).toEqual(['Newer Entry', 'Older Entry']);
      expect(rows[0].event.title).toBe('Chess Night');
      expect(rows[0].participant.id).toBe(newer.id);
    });

    it('should break timestamp ties by newest id', async () => {
      const event = await createTestEvent();
      const a = await createTestParticipant();
      const b = await createTestParticipant();
      const at = new Date('2026-01-01T10:00:00.000Z');
      const first = await createTestRegistration(event.id, a.id, { registeredAt: at });
      const second = await createTestRegistration(event.id, b.id, { registeredAt: at });

      const rows = await listRegistrations();

      expect(rows.map((r) => r.id)).toEqual([second.id, first.id]);
    });

    it('should filter by event', async () => {
      const wanted = await createTestEvent();
      const other = await createTestEvent();
      const p = await createTestParticipant();
      await createTestRegistration(wanted.id, p.id);
      await createTestRegistration(other.id, p.id);

      const rows = await listRegistrations(wanted.id);

      expect(rows).toHaveLength(1);
      expect(rows[0].eventId).toBe(wanted.id);
    });
  });

  describe('registeredEventIdsForOwner', () => {
    it('should collect events held by any participant of the owner', async () => {
      const owner = await createTestUser();
      const stranger = await createTestUser();
      const e1 = await createTestEvent();
      const e2 = await createTestEvent();
      const e3 = await createTestEvent();
      const child = await createTestParticipant({ ownerId: owner.id });
      const sibling = await createTestParticipant({ ownerId: owner.id });
      const unrelated = await createTestParticipant({ ownerId: stranger.id });
      await createTestRegistration(e1.id, child.id);
      await createTestRegistration(e2.id, sibling.id);
      await createTestRegistration(e1.id, sibling.id);
      await createTestRegistration(e3.id, unrelated.id);

      const ids = await registeredEventIdsForOwner(owner.id);

      expect([...ids].sort((x, y) => x - y)).toEqual([e1.id, e2.id]);
    });

    it('should be empty for an owner with no participants', async () => {
      const owner = await createTestUser();

      expect((await registeredEventIdsForOwner(owner.id)).size).toBe(0);
    });
  });

  // ==========================================================================
  // Export
  // ==========================================================================

  describe('generateCSV', () => {
    it('should quote values holding commas, quotes or newlines', () => {
      const entry: RegistrationWithRelations = {
        id: 7,
        eventId: 3,
        participantId: 5,
        source: 'walkin',
        registeredAt: new Date('2026-02-01T08:30:00.000Z'),
        event: {
          id: 3,
          title: 'Yoga, Basics',
          description: null,
          maxCapacity: 10,
          startTime: new Date('2026-03-01T10:00:00.000Z'),
          createdAt: new Date('2026-01-01T00:00:00.000Z'),
        },
        participant: {
          id: 5,
          naturalId: 'A1',
          fullName: 'Ana "Ace" Ruiz',
          ownerId: null,
          createdAt: new Date('2026-01-01T00:00:00.000Z'),
        },
      };

      const csv = generateCSV([entry]);

      expect(csv.split('\n')).toEqual([
        'ID,Event,Event Start,Participant,Natural ID,Source,Registered At',
        '7,"Yoga, Basics",2026-03-01T10:00:00.000Z,"Ana ""Ace"" Ruiz",A1,walkin,2026-02-01T08:30:00.000Z',
      ]);
    });

    it('should emit only the header for no rows', () => {
      expect(generateCSV([])).toBe('ID,Event,Event Start,Participant,Natural ID,Source,Registered At');
    });
  });

  describe('exportRegistrations', () => {
    it('should export one event as CSV', async () => {
      const event = await createTestEvent({ title: 'Quiz' });
      const p = await createTestParticipant({ naturalId: 'EXP1', fullName: 'Exporter' });
      await createTestRegistration(event.id, p.id);

      const result = await exportRegistrations({ eventId: event.id, format: 'csv' });

      expect(result.contentType).toBe('text/csv');
      expect(result.filename).toMatch(
        new RegExp(`^event-${event.id}-registrations-\\d{4}-\\d{2}-\\d{2}\\.csv$`)
      );
      const lines = result.data.split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toContain(',Quiz,');
      expect(lines[1]).toContain(',Exporter,EXP1,online,');
    });

    it('should export all events as JSON', async () => {
      const event = await createTestEvent({ title: 'Hike' });
      const p = await createTestParticipant({ naturalId: 'EXP2', fullName: 'Walker' });
      const reg = await createTestRegistration(event.id, p.id, {
        source: 'walkin',
        registeredAt: new Date('2026-04-01T12:00:00.000Z'),
      });

      const result = await exportRegistrations({ format: 'json' });

      expect(result.contentType).toBe('application/json');
      expect(result.filename).toMatch(/^all-events-registrations-\d{4}-\d{2}-\d{2}\.json$/);
      expect(JSON.parse(result.data)).toEqual([
        {
          id: reg.id,
          eventId: event.id,
          eventTitle: 'Hike',
          eventStart: event.startTime.toISOString(),
          participantName: 'Walker',
          naturalId: 'EXP2',
          source: 'walkin',
          registeredAt: '2026-04-01T12:00:00.000Z',
        },
      ]);
    });

    it('should reject an unknown event', async () => {
      try {
        await exportRegistrations({ eventId: 9999, format: 'csv' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        expect((error as AppError).statusCode).toBe(404);
        expect((error as AppError).code).toBe(ErrorCodes.EVENT_NOT_FOUND);
      }
    });
  });
});
