import type { SearchCriteria, TrackedItem } from '@stayhound/shared';

export const CRITERIA: SearchCriteria = {
  destination: 'București, România',
  checkIn: new Date('2026-11-01T00:00:00Z'),
  checkOut: new Date('2026-11-03T00:00:00Z'),
  guests: 2,
  maxPrice: 500,
  currency: 'RON',
  propertyTypes: ['hotel', 'apartment'],
  minRating: 7,
};

export function makeItem(overrides: Partial<TrackedItem> = {}): TrackedItem {
  const seen = new Date('2026-03-01T12:00:00Z');
  return {
    id: 1,
    identityKey: 'test-identity',
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
    firstSeen: seen,
    lastSeen: seen,
    timesSeen: 1,
    notified: false,
    ...overrides,
  };
}
