import { normalizeKeyPart } from '@stayhound/shared';
import type { Candidate, SearchCriteria } from '@stayhound/shared';

export type SortKey = 'price' | 'rating' | 'title';

// Approximate fixed rates. Pairs not listed go through RON.
const EXCHANGE_RATES: Record<string, number> = {
  'EUR:RON': 4.98,
  'USD:RON': 4.52,
  'RON:EUR': 0.2,
  'RON:USD': 0.22,
  'USD:EUR': 0.92,
  'EUR:USD': 1.09,
};

export function convertCurrency(amount: number, from: string, to: string): number {
  if (from === to) return amount;

  const rate = EXCHANGE_RATES[`${from}:${to}`];
  if (rate !== undefined) return amount * rate;

  if (from !== 'RON' && to !== 'RON') {
    const viaRon = `${from}:RON` in EXCHANGE_RATES && `RON:${to}` in EXCHANGE_RATES;
    if (viaRon) return convertCurrency(convertCurrency(amount, from, 'RON'), 'RON', to);
  }
  return amount;
}

/** Keeps candidates within the budget, re-priced in the criteria currency. */
export function filterByPrice(candidates: readonly Candidate[], criteria: SearchCriteria): Candidate[] {
  return candidates.flatMap((candidate) => {
    const price = Math.round(convertCurrency(candidate.price, candidate.currency, criteria.currency) * 100) / 100;
    if (!Number.isFinite(price) || price > criteria.maxPrice) return [];
    return [{ ...candidate, price, currency: criteria.currency }];
  });
}

export function filterByRating(candidates: readonly Candidate[], minRating: number): Candidate[] {
  return candidates.filter((candidate) => candidate.rating >= minRating);
}

/** First occurrence wins. */
export function filterDuplicates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    const key = JSON.stringify([normalizeKeyPart(candidate.title), normalizeKeyPart(candidate.location)]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function sortCandidates(candidates: readonly Candidate[], sortBy: SortKey = 'price'): Candidate[] {
  const sorted = [...candidates];
  switch (sortBy) {
    case 'price':
      return sorted.sort((a, b) => a.price - b.price);
    case 'rating':
      return sorted.sort((a, b) => b.rating - a.rating);
    case 'title':
      return sorted.sort((a, b) => a.title.toLowerCase().localeCompare(b.title.toLowerCase()));
  }
}

export type CandidateFilter = (candidates: readonly Candidate[], criteria: SearchCriteria) => Candidate[];

export const applyAllFilters: CandidateFilter = (candidates, criteria) => {
  const byPrice = filterByPrice(candidates, criteria);
  const byRating = filterByRating(byPrice, criteria.minRating);
  const unique = filterDuplicates(byRating);
  console.log(
    `[filter] ${candidates.length} fetched, ${byPrice.length} within budget, ${byRating.length} rated, ${unique.length} unique`,
  );
  return sortCandidates(unique, 'price');
};
