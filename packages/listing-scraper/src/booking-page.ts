import type { CheerioAPI } from 'cheerio';
import type { Candidate, SearchCriteria } from '@stayhound/shared';

export const BOOKING_SOURCE = 'booking';
export const BOOKING_BASE_URL = 'https://www.booking.com';

export const BOOKING_SELECTORS = {
  propertyCard: [
    'div[data-testid="property-card"]',
    'div.sr_property_block',
    'div.listItem',
  ] as const,
  title: ['[data-testid="title"]', 'h3'] as const,
  price: ['[data-testid="price-and-discounted-price"]', 'span.prco-valign-middle-helper'] as const,
  reviewScore: '[data-testid="review-score"]',
  address: '[data-testid="address"]',
  link: ['a[data-testid="title-link"]', 'a[href]'] as const,
  image: 'img',
  description: '[data-testid="recommended-units"]',
  amenities: '[data-testid="property-card-unit-configuration"] li',
} as const;

export interface ParsedPrice {
  amount: number;
  currency: string;
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function detectCurrency(text: string): string | null {
  const upper = text.toUpperCase();
  if (upper.includes('EUR') || text.includes('€')) return 'EUR';
  if (upper.includes('USD') || text.includes('$')) return 'USD';
  if (upper.includes('RON') || upper.includes('LEI')) return 'RON';
  return null;
}

export function parseLocalizedPrice(raw: string | null | undefined, fallbackCurrency: string): ParsedPrice | null {
  if (!raw) return null;
  const match = raw.match(/\d[\d\s\u00A0.,]*/);
  if (!match) return null;

  let numeric = match[0].replace(/[\s\u00A0]/g, '').replace(/[.,]+$/, '');
  if (/^\d{1,3}([.,]\d{3})+$/.test(numeric)) {
    // "1.234" and "1,234" group thousands
    numeric = numeric.replace(/[.,]/g, '');
  } else {
    // The last separator is the decimal point, the rest group thousands.
    const decimalAt = Math.max(numeric.lastIndexOf(','), numeric.lastIndexOf('.'));
    if (decimalAt >= 0) {
      numeric = `${numeric.slice(0, decimalAt).replace(/[.,]/g, '')}.${numeric.slice(decimalAt + 1)}`;
    }
  }

  const amount = Number.parseFloat(numeric);
  if (Number.isNaN(amount) || amount <= 0) return null;
  return { amount, currency: detectCurrency(raw) ?? fallbackCurrency };
}

/** Review scores come as "Scored 8,7" or "8.7 Excellent"; anything above 10 is not a score. */
export function parseRating(raw: string | null | undefined): number {
  if (!raw) return 0;
  const match = raw.replace(',', '.').match(/\d+(?:\.\d+)?/);
  if (!match) return 0;
  const rating = Number.parseFloat(match[0]);
  return rating >= 0 && rating <= 10 ? rating : 0;
}

export function isBlockedStatus(statusCode: number | null | undefined): boolean {
  return statusCode === 403 || statusCode === 429 || statusCode === 503;
}

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildBookingSearchUrl(criteria: SearchCriteria, baseUrl: string = BOOKING_BASE_URL): string {
  const params = new URLSearchParams({
    ss: criteria.destination,
    checkin: toIsoDate(criteria.checkIn),
    checkout: toIsoDate(criteria.checkOut),
    group_adults: String(criteria.guests),
    group_children: '0',
    no_rooms: '1',
    selected_currency: criteria.currency,
    sb_price_type: 'total',
    lang: 'ro',
  });
  return `${baseUrl}/searchresults.html?${params.toString()}`;
}

export function extractBookingListings(
  $: CheerioAPI,
  options: { baseUrl?: string; fallbackCurrency: string; maxResults?: number },
): Candidate[] {
  const baseUrl = options.baseUrl ?? BOOKING_BASE_URL;

  let cards = $(BOOKING_SELECTORS.propertyCard[0]);
  for (const selector of BOOKING_SELECTORS.propertyCard.slice(1)) {
    if (cards.length > 0) break;
    cards = $(selector);
  }

  const candidates: Candidate[] = [];
  cards.each((_, element) => {
    if (options.maxResults !== undefined && candidates.length >= options.maxResults) return false;

    const card = $(element);
    const firstText = (selectors: readonly string[]): string => {
      for (const selector of selectors) {
        const text = normalizeText(card.find(selector).first().text());
        if (text) return text;
      }
      return '';
    };

    const title = firstText(BOOKING_SELECTORS.title);
    const price = parseLocalizedPrice(firstText(BOOKING_SELECTORS.price), options.fallbackCurrency);
    if (!title || !price) return;

    let href: string | undefined;
    for (const selector of BOOKING_SELECTORS.link) {
      href = card.find(selector).first().attr('href');
      if (href) break;
    }

    const description = normalizeText(card.find(BOOKING_SELECTORS.description).first().text());
    const amenities = card
      .find(BOOKING_SELECTORS.amenities)
      .map((__, item) => normalizeText($(item).text()))
      .get()
      .filter((text) => text.length > 0);

    candidates.push({
      title,
      price: price.amount,
      currency: price.currency,
      rating: parseRating(card.find(BOOKING_SELECTORS.reviewScore).first().text()),
      location: normalizeText(card.find(BOOKING_SELECTORS.address).first().text()) || 'Unknown location',
      url: href ? new URL(href, baseUrl).toString() : baseUrl,
      imageUrl: card.find(BOOKING_SELECTORS.image).first().attr('src') ?? null,
      description: description || null,
      amenities,
      source: BOOKING_SOURCE,
    });
  });

  return candidates;
}
