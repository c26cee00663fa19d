import { and, arrayOverlaps, asc, avg, count, desc, eq, gte, inArray, lt, sql } from 'drizzle-orm';
import type { PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { Database } from '../db/client.js';
import {
  notificationRecords,
  priceObservations,
  queryRecords,
  trackedItems,
} from '../db/schema.js';
import type { NotificationKind, PriceObservation, TrackedItem } from '../db/schema.js';
import { StorageError, describeError } from '../errors.js';
import { criteriaIdentity, itemIdentity, serializeCriteria } from '../identity.js';
import { DAY_MS, systemClock } from '../time.js';
import type { Clock } from '../time.js';
import type {
  Candidate,
  PriceDropReport,
  PruneResult,
  SearchCriteria,
  SearchStatistics,
} from '../types.js';

/** The latest observation must fall inside this window to count as a drop. */
export const PRICE_DROP_RECENT_WINDOW_MS = 7 * DAY_MS;
/** The observation it is compared against must fall inside this one. */
export const PRICE_DROP_LOOKBACK_WINDOW_MS = 14 * DAY_MS;

export interface PriceDropOptions {
  /** Leave out drops already delivered by a successful price-drop notification. */
  onlyUnnotified?: boolean;
}

export interface TrackedItemStore {
  upsert(candidate: Candidate): Promise<number>;
  newSince(windowMs: number): Promise<TrackedItem[]>;
  markNotified(itemIds: readonly number[]): Promise<void>;
  priceDrops(thresholdPercent: number, options?: PriceDropOptions): Promise<PriceDropReport[]>;
  recordSearch(criteria: SearchCriteria, resultCount: number, durationMs: number): Promise<number | null>;
  recordNotification(
    itemIds: readonly number[],
    kind: NotificationKind,
    success: boolean,
    error?: string | null,
  ): Promise<number | null>;
  pruneOlderThan(retentionMs: number): Promise<PruneResult>;
  statistics(windowMs: number): Promise<SearchStatistics>;
  getItem(id: number): Promise<TrackedItem | null>;
  getItems(ids: readonly number[]): Promise<TrackedItem[]>;
  priceHistory(id: number): Promise<PriceObservation[]>;
}

export interface TrackedItemStoreOptions {
  now?: Clock;
}

async function withStorageError<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, { cause: err });
  }
}

/** Observation timestamps per item must strictly increase, even when the clock has not moved. */
export function nextObservationTime(now: Date, previous: Date | undefined): Date {
  if (previous && now.getTime() <= previous.getTime()) {
    return new Date(previous.getTime() + 1);
  }
  return now;
}

/** NaN never equals itself, so a NaN price would otherwise count as a change on every sighting. */
export function samePrice(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function computeDropPercent(previousPrice: number, currentPrice: number): number {
  return ((previousPrice - currentPrice) / previousPrice) * 100;
}

export function createTrackedItemStore<H extends PgQueryResultHKT>(
  db: Database<H>,
  options: TrackedItemStoreOptions = {},
): TrackedItemStore {
  const now = options.now ?? systemClock;

  async function getItems(ids: readonly number[]): Promise<TrackedItem[]> {
    if (ids.length === 0) return [];
    return withStorageError('getItems', () =>
      db.select().from(trackedItems).where(inArray(trackedItems.id, [...ids])),
    );
  }

  return {
    async upsert(candidate) {
      const identityKey = itemIdentity(candidate);
      const seenAt = now();

      return withStorageError('upsert', () =>
        db.transaction(async (tx) => {
          const selectForUpdate = async () => {
            const rows = await tx
              .select()
              .from(trackedItems)
              .where(eq(trackedItems.identityKey, identityKey))
              .for('update');
            return rows[0];
          };

          let existing = await selectForUpdate();

          if (!existing) {
            const inserted = await tx
              .insert(trackedItems)
              .values({
                identityKey,
                title: candidate.title,
                price: candidate.price,
                currency: candidate.currency,
                rating: candidate.rating,
                location: candidate.location,
                url: candidate.url,
                imageUrl: candidate.imageUrl,
                description: candidate.description,
                amenities: candidate.amenities,
                source: candidate.source,
                firstSeen: seenAt,
                lastSeen: seenAt,
                timesSeen: 1,
              })
              .onConflictDoNothing({ target: trackedItems.identityKey })
              .returning({ id: trackedItems.id });

            const created = inserted[0];
            if (created) {
              await tx.insert(priceObservations).values({
                itemId: created.id,
                price: candidate.price,
                currency: candidate.currency,
                observedAt: seenAt,
              });
              return created.id;
            }

            // Another writer inserted the same identity between our read and insert.
            existing = await selectForUpdate();
            if (!existing) {
              throw new Error(`Tracked item ${identityKey} disappeared during upsert`);
            }
          }

          if (!samePrice(existing.price, candidate.price) || existing.currency !== candidate.currency) {
            const [latest] = await tx
              .select({ observedAt: priceObservations.observedAt })
              .from(priceObservations)
              .where(eq(priceObservations.itemId, existing.id))
              .orderBy(desc(priceObservations.observedAt))
              .limit(1);

            await tx.insert(priceObservations).values({
              itemId: existing.id,
              price: candidate.price,
              currency: candidate.currency,
              observedAt: nextObservationTime(seenAt, latest?.observedAt),
            });
          }

          await tx
            .update(trackedItems)
            .set({
              title: candidate.title,
              price: candidate.price,
              currency: candidate.currency,
              rating: candidate.rating,
              url: candidate.url,
              imageUrl: candidate.imageUrl,
              description: candidate.description,
              amenities: candidate.amenities,
              lastSeen: seenAt > existing.lastSeen ? seenAt : existing.lastSeen,
              timesSeen: sql`${trackedItems.timesSeen} + 1`,
            })
            .where(eq(trackedItems.id, existing.id));

          return existing.id;
        }),
      );
    },

    async newSince(windowMs) {
      const cutoff = new Date(now().getTime() - windowMs);
      return withStorageError('newSince', () =>
        db
          .select()
          .from(trackedItems)
          .where(and(gte(trackedItems.firstSeen, cutoff), eq(trackedItems.notified, false)))
          .orderBy(desc(trackedItems.firstSeen), desc(trackedItems.id)),
      );
    },

    async markNotified(itemIds) {
      if (itemIds.length === 0) return;
      await withStorageError('markNotified', () =>
        db
          .update(trackedItems)
          .set({ notified: true })
          .where(inArray(trackedItems.id, [...itemIds])),
      );
    },

    async priceDrops(thresholdPercent, dropOptions = {}) {
      const current = now();
      const recentCutoff = current.getTime() - PRICE_DROP_RECENT_WINDOW_MS;
      const lookbackCutoff = new Date(current.getTime() - PRICE_DROP_LOOKBACK_WINDOW_MS);

      const observations = await withStorageError('priceDrops', () =>
        db
          .select()
          .from(priceObservations)
          .where(gte(priceObservations.observedAt, lookbackCutoff))
          .orderBy(asc(priceObservations.itemId), desc(priceObservations.observedAt)),
      );

      const byItem = new Map<number, PriceObservation[]>();
      for (const observation of observations) {
        const list = byItem.get(observation.itemId) ?? [];
        list.push(observation);
        byItem.set(observation.itemId, list);
      }

      const drops: Array<Omit<PriceDropReport, 'title' | 'location' | 'source' | 'url'>> = [];
      for (const [itemId, [latest, previous]] of byItem) {
        if (!latest || !previous) continue;
        if (latest.observedAt.getTime() < recentCutoff) continue;
        // A currency switch is not a price movement.
        if (latest.currency !== previous.currency || previous.price <= 0) continue;

        const dropPercent = computeDropPercent(previous.price, latest.price);
        if (dropPercent < thresholdPercent) continue;

        drops.push({
          itemId,
          currency: latest.currency,
          previousPrice: previous.price,
          currentPrice: latest.price,
          previousObservedAt: previous.observedAt,
          currentObservedAt: latest.observedAt,
          dropPercent,
        });
      }

      if (drops.length === 0) return [];

      let pending = drops;
      if (dropOptions.onlyUnnotified) {
        const earliest = new Date(Math.min(...drops.map((drop) => drop.currentObservedAt.getTime())));
        const delivered = await withStorageError('priceDrops', () =>
          db
            .select({ itemIds: notificationRecords.itemIds, createdAt: notificationRecords.createdAt })
            .from(notificationRecords)
            .where(
              and(
                eq(notificationRecords.kind, 'price_drop'),
                eq(notificationRecords.success, true),
                gte(notificationRecords.createdAt, earliest),
                arrayOverlaps(notificationRecords.itemIds, drops.map((drop) => drop.itemId)),
              ),
            ),
        );

        pending = drops.filter(
          (drop) =>
            !delivered.some(
              (record) =>
                record.createdAt >= drop.currentObservedAt && record.itemIds.includes(drop.itemId),
            ),
        );
      }

      const items = new Map((await getItems(pending.map((drop) => drop.itemId))).map((item) => [item.id, item]));

      return pending
        .flatMap((drop) => {
          const item = items.get(drop.itemId);
          if (!item) return [];
          return [{
            ...drop,
            title: item.title,
            location: item.location,
            source: item.source,
            url: item.url,
          }];
        })
        .sort((a, b) => b.dropPercent - a.dropPercent);
    },

    async recordSearch(criteria, resultCount, durationMs) {
      try {
        const [record] = await db
          .insert(queryRecords)
          .values({
            criteriaHash: criteriaIdentity(criteria),
            resultCount,
            criteriaJson: serializeCriteria(criteria),
            durationMs: Math.round(durationMs),
            createdAt: now(),
          })
          .returning({ id: queryRecords.id });
        return record?.id ?? null;
      } catch (err) {
        console.error('[store] Failed to record search:', describeError(err));
        return null;
      }
    },

    async recordNotification(itemIds, kind, success, error = null) {
      try {
        const [record] = await db
          .insert(notificationRecords)
          .values({
            itemIds: [...itemIds],
            kind,
            success,
            error,
            createdAt: now(),
          })
          .returning({ id: notificationRecords.id });
        return record?.id ?? null;
      } catch (err) {
        console.error(`[store] Failed to record ${kind} notification:`, describeError(err));
        return null;
      }
    },

    async pruneOlderThan(retentionMs) {
      const cutoff = new Date(now().getTime() - retentionMs);

      return withStorageError('pruneOlderThan', () =>
        db.transaction(async (tx) => {
          const searches = await tx
            .delete(queryRecords)
            .where(lt(queryRecords.createdAt, cutoff))
            .returning({ id: queryRecords.id });
          const observations = await tx
            .delete(priceObservations)
            .where(lt(priceObservations.observedAt, cutoff))
            .returning({ id: priceObservations.id });
          const notifications = await tx
            .delete(notificationRecords)
            .where(lt(notificationRecords.createdAt, cutoff))
            .returning({ id: notificationRecords.id });

          return {
            queryRecords: searches.length,
            priceObservations: observations.length,
            notificationRecords: notifications.length,
          };
        }),
      );
    },

    async statistics(windowMs) {
      const cutoff = new Date(now().getTime() - windowMs);

      return withStorageError('statistics', async () => {
        const [searches] = await db
          .select({ total: count(), average: avg(queryRecords.resultCount) })
          .from(queryRecords)
          .where(gte(queryRecords.createdAt, cutoff));

        const sources = await db
          .select({ source: trackedItems.source, total: count() })
          .from(trackedItems)
          .where(gte(trackedItems.firstSeen, cutoff))
          .groupBy(trackedItems.source)
          .orderBy(desc(count()));

        return {
          totalSearches: searches?.total ?? 0,
          avgResultCount: Number(searches?.average ?? 0),
          countsBySource: Object.fromEntries(sources.map((row) => [row.source, row.total])),
        };
      });
    },

    async getItem(id) {
      const [item] = await getItems([id]);
      return item ?? null;
    },

    getItems,

    async priceHistory(id) {
      return withStorageError('priceHistory', () =>
        db
          .select()
          .from(priceObservations)
          .where(eq(priceObservations.itemId, id))
          .orderBy(asc(priceObservations.observedAt)),
      );
    },
  };
}
