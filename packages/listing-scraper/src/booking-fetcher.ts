import { ImpitHttpClient } from '@crawlee/impit-client';
import { Configuration, HttpCrawler, ProxyConfiguration } from 'crawlee';
import { load } from 'cheerio';
import { FetchError, describeError } from '@stayhound/shared';
import type { Candidate, Fetcher, SearchCriteria } from '@stayhound/shared';
import {
  BOOKING_BASE_URL,
  BOOKING_SOURCE,
  buildBookingSearchUrl,
  extractBookingListings,
  isBlockedStatus,
} from './booking-page.js';

export interface LoadedPage {
  statusCode: number | null;
  body: string;
}

export type PageLoader = (url: string) => Promise<LoadedPage>;

export interface BookingFetcherOptions {
  baseUrl?: string;
  proxyUrl?: string;
  maxResults?: number;
  loadPage?: PageLoader;
}

export const DEFAULT_MAX_RESULTS = 25;

/** One crawler per call: the default request queue dedupes URLs it has already handled. */
export function createCrawlerPageLoader(proxyUrl?: string): PageLoader {
  return async (url) => {
    const proxyConfiguration = proxyUrl
      ? new ProxyConfiguration({ proxyUrls: [proxyUrl] })
      : undefined;

    const outcome: { page?: LoadedPage; error?: Error } = {};

    const crawler = new HttpCrawler(
      {
        httpClient: new ImpitHttpClient({ browser: 'firefox' }),
        proxyConfiguration,
        maxConcurrency: 1,
        maxRequestRetries: 2,
        requestHandlerTimeoutSecs: 30,
        requestHandler: async ({ request, response, body, log }) => {
          log.info(`Fetched ${request.url}`);
          outcome.page = { statusCode: response.statusCode ?? null, body: body.toString() };
        },
        failedRequestHandler: async (_context, error) => {
          outcome.error = error;
        },
      },
      new Configuration({ persistStorage: false }),
    );

    try {
      await crawler.run([
        {
          url,
          uniqueKey: `${url}#${Date.now()}`,
          headers: { 'Accept-Language': 'ro-RO,ro;q=0.9,en;q=0.8' },
        },
      ]);
    } finally {
      await crawler.teardown().catch(() => undefined);
    }

    if (outcome.error) throw outcome.error;
    if (!outcome.page) throw new Error(`No response captured for ${url}`);
    return outcome.page;
  };
}

export function createBookingFetcher(options: BookingFetcherOptions = {}): Fetcher {
  const baseUrl = options.baseUrl ?? BOOKING_BASE_URL;
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const loadPage = options.loadPage ?? createCrawlerPageLoader(options.proxyUrl);

  return {
    source: BOOKING_SOURCE,
    async fetch(criteria: SearchCriteria): Promise<Candidate[]> {
      const url = buildBookingSearchUrl(criteria, baseUrl);

      let page: LoadedPage;
      try {
        page = await loadPage(url);
      } catch (err) {
        throw new FetchError(BOOKING_SOURCE, `Request failed: ${describeError(err)}`, { cause: err });
      }

      if (isBlockedStatus(page.statusCode)) {
        throw new FetchError(BOOKING_SOURCE, `Blocked with status ${page.statusCode}`);
      }

      const candidates = extractBookingListings(load(page.body), {
        baseUrl,
        fallbackCurrency: criteria.currency,
        maxResults,
      });
      console.log(`[booking] ${candidates.length} listings on ${url}`);
      return candidates;
    },
  };
}
