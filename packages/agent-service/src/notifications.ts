import type { Candidate, PriceDropReport, SearchCriteria, TrackedItem } from '@stayhound/shared';

type Listing = Pick<Candidate, 'title' | 'price' | 'currency' | 'rating' | 'location' | 'url'>;

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function formatPrice(amount: number, currency: string): string {
  return `${amount.toFixed(2)} ${currency}`;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatRating(rating: number): string {
  return rating > 0 ? `rating ${rating.toFixed(1)}` : 'no rating';
}

function formatListing(listing: Listing): string {
  return [
    listing.title,
    `${formatPrice(listing.price, listing.currency)} | ${formatRating(listing.rating)} | ${listing.location}`,
    listing.url,
  ].join('\n');
}

export function formatNewItemsMessage(items: readonly TrackedItem[], criteria: SearchCriteria): string {
  const header = [
    `New listings: ${items.length} in ${criteria.destination}`,
    `${formatDate(criteria.checkIn)} → ${formatDate(criteria.checkOut)}, ${criteria.guests} guests, max ${formatPrice(criteria.maxPrice, criteria.currency)}`,
  ].join('\n');

  return [header, ...items.map(formatListing)].join('\n\n');
}

export function formatTargetPriceMessage(items: readonly Listing[], targetPrice: number, currency: string): string {
  const header = `Below target price: ${items.length} at or under ${formatPrice(targetPrice, currency)}`;
  return [header, ...items.map(formatListing)].join('\n\n');
}

export function formatPriceDropMessage(drops: readonly PriceDropReport[]): string {
  const entries = drops.map((drop) =>
    [
      `${drop.title} (${drop.location})`,
      `${formatPrice(drop.previousPrice, drop.currency)} → ${formatPrice(drop.currentPrice, drop.currency)} (-${drop.dropPercent.toFixed(0)}%)`,
      drop.url,
    ].join('\n'),
  );

  return [`Price drops: ${drops.length}`, ...entries].join('\n\n');
}

export function formatTestMessage(sentAt: Date): string {
  return `Stayhound test notification\nSent at ${sentAt.toISOString()}`;
}

/**
 * Splits on blank lines so a listing is never cut in half. A single block over
 * the limit is hard-wrapped.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const block of text.split('\n\n')) {
    const candidate = current ? `${current}\n\n${block}` : block;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current) chunks.push(current);
    current = block;
    while (current.length > limit) {
      chunks.push(current.slice(0, limit));
      current = current.slice(limit);
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
