/** Unvalidated listing produced by a fetcher. Has no identity until hashed. */
export interface Candidate {
  title: string;
  price: number;
  currency: string;
  rating: number;
  location: string;
  url: string;
  imageUrl: string | null;
  description: string | null;
  amenities: string[];
  source: string;
}

export interface SearchCriteria {
  destination: string;
  checkIn: Date;
  checkOut: Date;
  guests: number;
  maxPrice: number;
  currency: string;
  propertyTypes: string[];
  minRating: number;
}

export interface PriceDropReport {
  itemId: number;
  title: string;
  location: string;
  source: string;
  url: string;
  currency: string;
  previousPrice: number;
  currentPrice: number;
  previousObservedAt: Date;
  currentObservedAt: Date;
  dropPercent: number;
}

export interface SearchStatistics {
  totalSearches: number;
  avgResultCount: number;
  countsBySource: Record<string, number>;
}

export interface PruneResult {
  queryRecords: number;
  priceObservations: number;
  notificationRecords: number;
}

/** Fetches candidate listings for a search from one source. */
export interface Fetcher {
  readonly source: string;
  fetch(criteria: SearchCriteria): Promise<Candidate[]>;
}
