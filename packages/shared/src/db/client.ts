import { fileURLToPath } from 'node:url';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema.js';

export type Schema = typeof schema;

/** Output folder of `drizzle-kit generate` (see drizzle.config.ts). */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle', import.meta.url));

/** Any drizzle Postgres database over the stayhound schema, whatever the driver. */
export type Database<H extends PgQueryResultHKT = PgQueryResultHKT> = PgDatabase<H, Schema>;

export function createDb(connectionString: string) {
  const client = postgres(connectionString, { max: 5, idle_timeout: 30 });
  return drizzle(client, { schema });
}

export type Db = ReturnType<typeof createDb>;

export async function closeDb(db: Db): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
