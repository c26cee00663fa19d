import {
  pgTable,
  serial,
  bigserial,
  text,
  doublePrecision,
  integer,
  boolean,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

export const trackedItems = pgTable('tracked_items', {
  id: serial('id').primaryKey(),
  identityKey: text('identity_key').notNull().unique(),
  title: text('title').notNull(),
  price: doublePrecision('price').notNull(),
  currency: text('currency').notNull(),
  rating: doublePrecision('rating').default(0).notNull(),
  location: text('location').notNull(),
  url: text('url').notNull(),
  imageUrl: text('image_url'),
  description: text('description'),
  amenities: jsonb('amenities').$type<string[]>().default([]).notNull(),
  source: text('source').notNull(), // fetcher name, e.g. 'booking'
  firstSeen: timestamp('first_seen', { withTimezone: true }).notNull(),
  lastSeen: timestamp('last_seen', { withTimezone: true }).notNull(),
  timesSeen: integer('times_seen').default(1).notNull(),
  notified: boolean('notified').default(false).notNull(),
}, (table) => [
  index('idx_tracked_items_first_seen').on(table.firstSeen),
  index('idx_tracked_items_source').on(table.source),
]);

export const priceObservations = pgTable('price_observations', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  itemId: integer('item_id').references(() => trackedItems.id, { onDelete: 'cascade' }).notNull(),
  price: doublePrecision('price').notNull(),
  currency: text('currency').notNull(),
  observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_price_observations_item_observed').on(table.itemId, table.observedAt),
]);

export const queryRecords = pgTable('query_records', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  criteriaHash: text('criteria_hash').notNull(),
  resultCount: integer('result_count').default(0).notNull(),
  criteriaJson: jsonb('criteria_json').$type<Record<string, unknown>>().notNull(),
  durationMs: integer('duration_ms').default(0).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_query_records_criteria_hash').on(table.criteriaHash),
  index('idx_query_records_created').on(table.createdAt),
]);

export const notificationRecords = pgTable('notification_records', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  itemIds: integer('item_ids').array().notNull(),
  kind: text('kind').$type<NotificationKind>().notNull(),
  success: boolean('success').default(true).notNull(),
  error: text('error'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_notification_records_kind_created').on(table.kind, table.createdAt),
]);

export type NotificationKind = 'new_items' | 'price_drop' | 'target_price' | 'test';

export type TrackedItem = typeof trackedItems.$inferSelect;
export type PriceObservation = typeof priceObservations.$inferSelect;
export type QueryRecord = typeof queryRecords.$inferSelect;
export type NotificationRecord = typeof notificationRecords.$inferSelect;
