export * from './db/schema.js';
export * from './db/client.js';
export * from './errors.js';
export * from './identity.js';
export * from './time.js';
export * from './types.js';
export * from './store/tracked-item-store.js';
