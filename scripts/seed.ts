/// <reference types="node" />
/**
 * Seed a staff account and a starter event catalog.
 * Run with: npm run db:seed
 */
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { registerAccount } from '../src/modules/identity/users.service.js';
import { createEvent, listEvents } from '../src/modules/events/events.service.js';
import { CreateEventSchema } from '../src/modules/events/events.schema.js';
import { UserRole } from '../src/modules/identity/permissions.js';
import { guestContext } from '../src/shared/types/context.js';
import { config } from '../src/config/app.config.js';
import { client } from '../src/database/client.js';

const SeedFileSchema = z.object({
  events: z.array(CreateEventSchema),
});

const { SEED_ADMIN_EMAIL, SEED_ADMIN_PASSWORD, SEED_ADMIN_NAME } = process.env;

async function main() {
  const seed = SeedFileSchema.parse(
    JSON.parse(readFileSync(new URL('./seed-data.json', import.meta.url), 'utf8'))
  );

  if (SEED_ADMIN_EMAIL && SEED_ADMIN_PASSWORD) {
    console.log('Creating staff account...');
    const { user } = await registerAccount(guestContext('seed'), {
      email: SEED_ADMIN_EMAIL,
      password: SEED_ADMIN_PASSWORD,
      name: SEED_ADMIN_NAME || 'Staff',
      role: UserRole.ADMIN,
      accessCode: config.auth.staffAccessCode,
    });
    console.log('  ID:', user.id);
    console.log('  Email:', user.email);
  } else {
    console.log('SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD not set, skipping staff account');
  }

  const existing = new Set((await listEvents()).map((e) => e.title));
  for (const input of seed.events) {
    if (existing.has(input.title)) {
      console.log(`Event exists: ${input.title}`);
      continue;
    }
    const event = await createEvent(input);
    console.log(`Event created: ${event.title} (#${event.id})`);
  }
}

main()
  .catch((error) => {
    console.error('Seed failed:', error);
    process.exitCode = 1;
  })
  .finally(() => client.close());
