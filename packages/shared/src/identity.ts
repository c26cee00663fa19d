import { createHash } from 'node:crypto';
import type { Candidate, SearchCriteria } from './types.js';

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function normalizeKeyPart(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Stable identity of a listing: normalized title and location plus the source
 * it came from. Price and rating changes mutate one item, they never create a new one.
 */
export function itemIdentity(candidate: Pick<Candidate, 'title' | 'location' | 'source'>): string {
  return sha256(
    JSON.stringify([normalizeKeyPart(candidate.title), normalizeKeyPart(candidate.location), candidate.source]),
  );
}

/** Dates are per run, so a rolling-date search keeps the same identity. */
export function criteriaIdentity(criteria: SearchCriteria): string {
  const { checkIn: _checkIn, checkOut: _checkOut, ...stable } = criteria;
  return sha256(JSON.stringify(stable, Object.keys(stable).sort()));
}

export function serializeCriteria(criteria: SearchCriteria): Record<string, unknown> {
  return {
    ...criteria,
    checkIn: criteria.checkIn.toISOString(),
    checkOut: criteria.checkOut.toISOString(),
  };
}
