import {
  DAY_MS,
  describeError,
  serializeCriteria,
  systemClock,
} from '@stayhound/shared';
import type {
  Candidate,
  Clock,
  Fetcher,
  PruneResult,
  SearchCriteria,
  SearchStatistics,
  TrackedItemStore,
} from '@stayhound/shared';
import { applyAllFilters } from './filter.js';
import type { CandidateFilter } from './filter.js';
import type { Notifier, NotifyBatch } from './notifier.js';
import type { Cadence } from './scheduler/scheduled-task.js';
import type { Scheduler, SchedulerStatus } from './scheduler/scheduler.js';

export const TASK_NAMES = {
  search: 'listing_search',
  priceAlerts: 'price_alerts',
  cleanup: 'retention_cleanup',
  heartbeat: 'heartbeat',
} as const;

export const STATISTICS_WINDOW_MS = 7 * DAY_MS;

export interface AgentSchedule {
  search: Cadence;
  priceAlerts: Cadence;
  cleanup: Cadence;
  /** null leaves the heartbeat task out. */
  heartbeat: Cadence | null;
}

export interface AgentSettings {
  newItemWindowMs: number;
  priceDropThresholdPercent: number;
  /** null turns the target-price alert off. */
  targetPrice: number | null;
  retentionMs: number;
  schedule: AgentSchedule;
}

export interface PassSummary {
  startedAt: Date;
  durationMs: number;
  fetched: number;
  failedSources: string[];
  kept: number;
  newItems: number;
  /** null when there was nothing to send. */
  newItemsDelivered: boolean | null;
  targetMatches: number;
  targetDelivered: boolean | null;
  priceDrops: number;
  priceDropsDelivered: boolean | null;
  /** Set when a failure ended the pass early. */
  error: string | null;
}

export interface AgentStatus {
  criteria: Record<string, unknown>;
  sources: string[];
  lastPass: PassSummary | null;
  statistics: SearchStatistics | null;
  statisticsUpdatedAt: Date | null;
  scheduler: SchedulerStatus | null;
}

export interface AgentDeps {
  store: TrackedItemStore;
  fetchers: readonly Fetcher[];
  notifier: Notifier;
  criteria: SearchCriteria;
  settings: AgentSettings;
  filter?: CandidateFilter;
  now?: Clock;
}

export interface Agent {
  searchAndProcess(): Promise<PassSummary>;
  /** Returns how many drops were delivered. */
  runPriceAlerts(): Promise<number>;
  cleanup(): Promise<PruneResult | null>;
  heartbeat(): void;
  registerTasks(scheduler: Scheduler): void;
  getStatus(): Promise<AgentStatus>;
  testNotify(): Promise<boolean>;
}

export function createAgent(deps: AgentDeps): Agent {
  const { store, fetchers, notifier, criteria, settings } = deps;
  const filter = deps.filter ?? applyAllFilters;
  const now = deps.now ?? systemClock;

  let scheduler: Scheduler | null = null;
  let lastPass: PassSummary | null = null;
  let cachedStatistics: { value: SearchStatistics; at: Date } | null = null;

  // Delivery failures never leave this function; they are logged and recorded.
  async function deliver(batch: NotifyBatch, itemIds: readonly number[]): Promise<boolean> {
    let success = false;
    let error: string | null = null;
    try {
      success = await notifier.notify(batch);
      if (!success) error = 'Notifier reported failure';
    } catch (err) {
      error = describeError(err);
    }

    if (!success) console.error(`[agent] ${batch.kind} notification failed:`, error);
    await store.recordNotification(itemIds, batch.kind, success, error);
    return success;
  }

  async function fetchAll(): Promise<{ candidates: Candidate[]; failedSources: string[] }> {
    const results = await Promise.allSettled(fetchers.map((fetcher) => fetcher.fetch(criteria)));
    const candidates: Candidate[] = [];
    const failedSources: string[] = [];

    results.forEach((result, index) => {
      const source = fetchers[index]?.source ?? `#${index}`;
      if (result.status === 'fulfilled') {
        candidates.push(...result.value);
      } else {
        failedSources.push(source);
        console.error(`[agent] Source ${source} failed:`, describeError(result.reason));
      }
    });

    return { candidates, failedSources };
  }

  async function notifyPriceDrops(): Promise<{ found: number; delivered: boolean | null }> {
    const drops = await store.priceDrops(settings.priceDropThresholdPercent, { onlyUnnotified: true });
    if (drops.length === 0) return { found: 0, delivered: null };

    console.log(`[agent] ${drops.length} price drops of at least ${settings.priceDropThresholdPercent}%`);
    const delivered = await deliver({ kind: 'price_drop', drops }, drops.map((drop) => drop.itemId));
    return { found: drops.length, delivered };
  }

  const agent: Agent = {
    async searchAndProcess() {
      const startedAt = now();
      const started = Date.now();
      const summary: PassSummary = {
        startedAt,
        durationMs: 0,
        fetched: 0,
        failedSources: [],
        kept: 0,
        newItems: 0,
        newItemsDelivered: null,
        targetMatches: 0,
        targetDelivered: null,
        priceDrops: 0,
        priceDropsDelivered: null,
        error: null,
      };

      console.log(`[agent] Searching ${fetchers.map((f) => f.source).join(', ')} for ${criteria.destination}`);

      try {
        const { candidates, failedSources } = await fetchAll();
        summary.fetched = candidates.length;
        summary.failedSources = failedSources;

        const kept = filter(candidates, criteria);
        summary.kept = kept.length;

        const ids = new Map<Candidate, number>();
        for (const candidate of kept) {
          ids.set(candidate, await store.upsert(candidate));
        }

        const fresh = await store.newSince(settings.newItemWindowMs);
        summary.newItems = fresh.length;
        if (fresh.length > 0) {
          const freshIds = fresh.map((item) => item.id);
          summary.newItemsDelivered = await deliver({ kind: 'new_items', items: fresh, criteria }, freshIds);
          if (summary.newItemsDelivered) await store.markNotified(freshIds);
        }

        const { targetPrice } = settings;
        if (targetPrice !== null) {
          const matches = kept.filter(
            (candidate) => candidate.currency === criteria.currency && candidate.price <= targetPrice,
          );
          summary.targetMatches = matches.length;
          if (matches.length > 0) {
            summary.targetDelivered = await deliver(
              { kind: 'target_price', items: matches, targetPrice, currency: criteria.currency },
              matches.flatMap((candidate) => ids.get(candidate) ?? []),
            );
          }
        }

        const drops = await notifyPriceDrops();
        summary.priceDrops = drops.found;
        summary.priceDropsDelivered = drops.delivered;
      } catch (err) {
        summary.error = describeError(err);
        summary.durationMs = Date.now() - started;
        console.error('[agent] Pass ended early:', summary.error);
        lastPass = summary;
        return summary;
      }

      summary.durationMs = Date.now() - started;
      await store.recordSearch(criteria, summary.kept, summary.durationMs);

      console.log(
        `[agent] Pass complete: ${summary.fetched} fetched, ${summary.kept} kept, ${summary.newItems} new, ${summary.targetMatches} under target, ${summary.priceDrops} price drops, ${summary.durationMs}ms`,
      );
      lastPass = summary;
      return summary;
    },

    async runPriceAlerts() {
      try {
        const { found, delivered } = await notifyPriceDrops();
        return delivered ? found : 0;
      } catch (err) {
        console.error('[agent] Price alert check failed:', describeError(err));
        return 0;
      }
    },

    async cleanup() {
      try {
        const pruned = await store.pruneOlderThan(settings.retentionMs);
        console.log(
          `[agent] Pruned ${pruned.queryRecords} searches, ${pruned.priceObservations} observations, ${pruned.notificationRecords} notifications`,
        );
        return pruned;
      } catch (err) {
        console.error('[agent] Cleanup failed:', describeError(err));
        return null;
      }
    },

    heartbeat() {
      const last = lastPass ? lastPass.startedAt.toISOString() : 'never';
      console.log(`[agent] Heartbeat: alive, last search pass ${last}`);
    },

    registerTasks(target) {
      const { schedule } = settings;
      target.addTask({
        name: TASK_NAMES.search,
        cadence: schedule.search,
        run: async () => {
          await agent.searchAndProcess();
        },
      });
      target.addTask({
        name: TASK_NAMES.priceAlerts,
        cadence: schedule.priceAlerts,
        run: async () => {
          await agent.runPriceAlerts();
        },
      });
      target.addTask({
        name: TASK_NAMES.cleanup,
        cadence: schedule.cleanup,
        run: async () => {
          await agent.cleanup();
        },
      });
      if (schedule.heartbeat) {
        target.addTask({ name: TASK_NAMES.heartbeat, cadence: schedule.heartbeat, run: () => agent.heartbeat() });
      }
      scheduler = target;
    },

    async getStatus() {
      try {
        cachedStatistics = { value: await store.statistics(STATISTICS_WINDOW_MS), at: now() };
      } catch (err) {
        console.warn('[agent] Statistics unavailable, serving last known values:', describeError(err));
      }

      return {
        criteria: serializeCriteria(criteria),
        sources: fetchers.map((fetcher) => fetcher.source),
        lastPass,
        statistics: cachedStatistics?.value ?? null,
        statisticsUpdatedAt: cachedStatistics?.at ?? null,
        scheduler: scheduler?.getStatus() ?? null,
      };
    },

    async testNotify() {
      return deliver({ kind: 'test' }, []);
    },
  };

  return agent;
}
