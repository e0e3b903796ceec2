import { readFileSync } from 'node:fs';
import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase, type PgliteQueryResultHKT } from 'drizzle-orm/pglite';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema.js';

export type AppDatabase = PgliteDatabase<typeof schema>;

/**
 * Anything queries can run against: the database itself or an open transaction.
 * PGlite runs one transaction at a time, so inside a transaction callback a
 * query on `db` waits for that same transaction and never returns.
 */
export type Executor = PgDatabase<PgliteQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  db: AppDatabase;
  client: PGlite;
}

const schemaSql = readFileSync(new URL('./schema.sql', import.meta.url), 'utf8');

/**
 * Open an embedded Postgres store and make sure every table exists.
 *
 * @param dataDir - directory holding the data files, or `memory://`
 */
export async function createDatabase(dataDir: string): Promise<DatabaseConnection> {
  const client = new PGlite(dataDir);
  await client.exec(schemaSql);

  return { db: drizzle(client, { schema }), client };
}
