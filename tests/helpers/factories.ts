import { faker } from '@faker-js/faker';
import { testDb } from '../mocks/database.js';
import {
  events,
  participants,
  registrations,
  users,
  type Event,
  type Participant,
  type Registration,
  type User,
} from '@/database/schema.js';
import { hashPassword } from '@shared/utils/password.js';

// ============================================================================
// User Factory
// ============================================================================

export const TEST_PASSWORD = 'test-password';

export async function createTestUser(overrides: Partial<User> = {}): Promise<User> {
  const [user] = await testDb
    .insert(users)
    .values({
      email: faker.internet.email().toLowerCase(),
      passwordHash: overrides.passwordHash ?? (await hashPassword(TEST_PASSWORD)),
      role: 'caregiver',
      displayName: faker.person.fullName(),
      createdAt: faker.date.past(),
      ...overrides,
    })
    .returning();
  return user;
}

export function createTestAdmin(overrides: Partial<User> = {}): Promise<User> {
  return createTestUser({ role: 'admin', ...overrides });
}

// ============================================================================
// Participant Factory
// ============================================================================

let naturalIdSeq = 0;

export function nextNaturalId(): string {
  naturalIdSeq += 1;
  return `NID${String(naturalIdSeq).padStart(6, '0')}`;
}

export async function createTestParticipant(
  overrides: Partial<Participant> = {}
): Promise<Participant> {
  const [participant] = await testDb
    .insert(participants)
    .values({
      naturalId: nextNaturalId(),
      fullName: faker.person.fullName(),
      ownerId: null,
      createdAt: faker.date.past(),
      ...overrides,
    })
    .returning();
  return participant;
}

// ============================================================================
// Event Factory
// ============================================================================

export async function createTestEvent(overrides: Partial<Event> = {}): Promise<Event> {
  const [event] = await testDb
    .insert(events)
    .values({
      title: faker.lorem.words(3),
      description: faker.lorem.sentence(),
      maxCapacity: faker.number.int({ min: 5, max: 50 }),
      startTime: faker.date.future(),
      createdAt: faker.date.past(),
      ...overrides,
    })
    .returning();
  return event;
}

// ============================================================================
// Registration Factory
// ============================================================================

export async function createTestRegistration(
  eventId: number,
  participantId: number,
  overrides: Partial<Registration> = {}
): Promise<Registration> {
  const [registration] = await testDb
    .insert(registrations)
    .values({
      eventId,
      participantId,
      source: 'online',
      registeredAt: new Date(),
      ...overrides,
    })
    .returning();
  return registration;
}
