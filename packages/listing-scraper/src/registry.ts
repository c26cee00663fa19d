import { ConfigError } from '@stayhound/shared';
import type { Fetcher } from '@stayhound/shared';
import { createBookingFetcher } from './booking-fetcher.js';
import type { BookingFetcherOptions } from './booking-fetcher.js';

export type FetcherFactory = () => Fetcher;

export type FetcherRegistry = ReadonlyMap<string, FetcherFactory>;

export function createFetcherRegistry(factories: Record<string, FetcherFactory>): FetcherRegistry {
  return new Map(Object.entries(factories));
}

export function createDefaultRegistry(options: { booking?: BookingFetcherOptions } = {}): FetcherRegistry {
  return createFetcherRegistry({
    booking: () => createBookingFetcher(options.booking),
  });
}

export function resolveFetchers(registry: FetcherRegistry, names: readonly string[]): Fetcher[] {
  return names.map((name) => {
    const factory = registry.get(name);
    if (!factory) {
      const supported = [...registry.keys()].join(', ');
      throw new ConfigError(`Unsupported source "${name}" (supported: ${supported})`);
    }
    return factory();
  });
}
