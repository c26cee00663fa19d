import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { migrate } from 'drizzle-orm/pglite/migrator';
import * as schema from './db/schema.js';
import { MIGRATIONS_FOLDER } from './db/client.js';
import type { Candidate } from './types.js';

/** In-process Postgres with the stayhound schema applied, for tests. */
export async function createTestDb() {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  return {
    db,
    close: () => client.close(),
  };
}

export interface ManualClock {
  now: () => Date;
  set(date: Date): void;
  advance(ms: number): void;
}

export function createManualClock(start: Date): ManualClock {
  let current = start;
  return {
    now: () => current,
    set(date) {
      current = date;
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    title: 'Hotel Central',
    price: 100,
    currency: 'RON',
    rating: 8.5,
    location: 'Centru, București',
    url: 'https://listings.example/hotel-central',
    imageUrl: null,
    description: null,
    amenities: [],
    source: 'booking',
    ...overrides,
  };
}
