export * from './booking-page.js';
export * from './booking-fetcher.js';
export * from './registry.js';
