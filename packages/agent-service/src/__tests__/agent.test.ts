import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
  DAY_MS,
  FetchError,
  HOUR_MS,
  NotifyError,
  StorageError,
  createTrackedItemStore,
  notificationRecords,
} from '@stayhound/shared';
import type { Candidate, Fetcher, TrackedItemStore } from '@stayhound/shared';
import { createManualClock, createTestDb, makeCandidate } from '@stayhound/shared/testing';
import type { ManualClock } from '@stayhound/shared/testing';
import { TASK_NAMES, createAgent } from '../agent.js';
import type { AgentDeps, AgentSettings } from '../agent.js';
import type { Notifier } from '../notifier.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { CRITERIA } from './fixtures.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const SETTINGS: AgentSettings = {
  newItemWindowMs: 24 * HOUR_MS,
  priceDropThresholdPercent: 10,
  targetPrice: null,
  retentionMs: 30 * DAY_MS,
  schedule: {
    search: { value: 6, unit: 'hours' },
    priceAlerts: { value: 30, unit: 'minutes' },
    cleanup: { value: 1, unit: 'days' },
    heartbeat: { value: 15, unit: 'minutes' },
  },
};

const LISTINGS: Candidate[] = [
  makeCandidate({ title: 'Hotel X ', location: 'Centru' }),
  makeCandidate({ title: 'hotel x', location: 'centru' }),
  makeCandidate({ title: 'Vila Mara', location: 'Dorobanți', price: 250, url: 'https://listings.example/vila-mara' }),
];

function stubFetcher(source: string, candidates: Candidate[]): Fetcher {
  return { source, fetch: vi.fn(async () => candidates) };
}

describe('Agent', () => {
  let testDb: Awaited<ReturnType<typeof createTestDb>>;
  let clock: ManualClock;
  let store: TrackedItemStore;
  let notify: Mock<Notifier['notify']>;

  function makeAgent(overrides: Partial<AgentDeps> = {}) {
    return createAgent({
      store,
      fetchers: [stubFetcher('booking', LISTINGS)],
      notifier: { notify },
      criteria: CRITERIA,
      settings: SETTINGS,
      now: clock.now,
      ...overrides,
    });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    testDb = await createTestDb();
    clock = createManualClock(NOW);
    store = createTrackedItemStore(testDb.db, { now: clock.now });
    notify = vi.fn<Notifier['notify']>(async () => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await testDb.close();
  });

  describe('searchAndProcess', () => {
    it('tracks, notifies once and counts repeat sightings across passes', async () => {
      const agent = makeAgent();

      const first = await agent.searchAndProcess();

      expect(first).toMatchObject({
        fetched: 3,
        failedSources: [],
        kept: 2,
        newItems: 2,
        newItemsDelivered: true,
        targetMatches: 0,
        targetDelivered: null,
        priceDrops: 0,
        priceDropsDelivered: null,
        error: null,
      });
      expect(notify).toHaveBeenCalledOnce();
      const batch = notify.mock.calls[0]?.[0];
      if (batch?.kind !== 'new_items') throw new Error(`unexpected batch ${batch?.kind}`);
      expect(batch.items.map((item) => item.title).sort()).toEqual(['Hotel X ', 'Vila Mara']);
      expect(await store.newSince(SETTINGS.newItemWindowMs)).toEqual([]);

      clock.advance(6 * HOUR_MS);
      const second = await agent.searchAndProcess();

      expect(second).toMatchObject({ kept: 2, newItems: 0, newItemsDelivered: null });
      expect(notify).toHaveBeenCalledOnce();
      const items = await store.getItems(batch.items.map((item) => item.id));
      expect(items.map((item) => item.timesSeen)).toEqual([2, 2]);

      const status = await agent.getStatus();
      expect(status.statistics?.totalSearches).toBe(2);
      expect(status.lastPass).toBe(second);
    });

    it('alerts on listings at or under the target price on every pass', async () => {
      const agent = makeAgent({ settings: { ...SETTINGS, targetPrice: 150 } });

      const first = await agent.searchAndProcess();

      expect(first).toMatchObject({ kept: 2, targetMatches: 1, targetDelivered: true });
      expect(notify).toHaveBeenCalledTimes(2);
      const batch = notify.mock.calls[1]?.[0];
      if (batch?.kind !== 'target_price') throw new Error(`unexpected batch ${batch?.kind}`);
      expect(batch.targetPrice).toBe(150);
      expect(batch.currency).toBe('RON');
      expect(batch.items.map((item) => [item.title, item.price])).toEqual([['Hotel X ', 100]]);

      const records = await testDb.db.select().from(notificationRecords);
      const targetRecord = records.find((record) => record.kind === 'target_price');
      expect(targetRecord).toMatchObject({ success: true, error: null });
      expect(targetRecord?.itemIds).toHaveLength(1);

      clock.advance(6 * HOUR_MS);
      const second = await agent.searchAndProcess();

      expect(second).toMatchObject({ newItems: 0, targetMatches: 1, targetDelivered: true });
      expect(notify).toHaveBeenCalledTimes(3);
      expect(notify.mock.calls[2]?.[0].kind).toBe('target_price');
    });

    it('skips the target-price alert when nothing is cheap enough', async () => {
      const agent = makeAgent({ settings: { ...SETTINGS, targetPrice: 50 } });

      const summary = await agent.searchAndProcess();

      expect(summary).toMatchObject({ targetMatches: 0, targetDelivered: null });
      expect(notify).toHaveBeenCalledOnce();
    });

    it('keeps going when one source fails', async () => {
      const failing: Fetcher = {
        source: 'airbnb',
        fetch: async () => {
          throw new FetchError('airbnb', 'Request failed: timeout');
        },
      };
      const agent = makeAgent({ fetchers: [failing, stubFetcher('booking', LISTINGS)] });

      const summary = await agent.searchAndProcess();

      expect(summary.failedSources).toEqual(['airbnb']);
      expect(summary.kept).toBe(2);
      expect(console.error).toHaveBeenCalledWith('[agent] Source airbnb failed:', '[airbnb] Request failed: timeout');
    });

    it('records the search and leaves items unnotified when delivery fails', async () => {
      notify.mockRejectedValue(new NotifyError('Telegram down'));
      const agent = makeAgent();

      const summary = await agent.searchAndProcess();

      expect(summary.newItemsDelivered).toBe(false);
      expect(await store.newSince(SETTINGS.newItemWindowMs)).toHaveLength(2);
      expect((await store.statistics(DAY_MS)).totalSearches).toBe(1);

      const [record] = await testDb.db.select().from(notificationRecords);
      expect(record).toMatchObject({ kind: 'new_items', success: false, error: 'Telegram down' });
      expect(record?.itemIds).toHaveLength(2);
    });

    it('retries delivery on the next pass after a failure', async () => {
      notify.mockResolvedValueOnce(false);
      const agent = makeAgent();

      expect((await agent.searchAndProcess()).newItemsDelivered).toBe(false);
      clock.advance(HOUR_MS);
      expect((await agent.searchAndProcess()).newItemsDelivered).toBe(true);
      expect(await store.newSince(SETTINGS.newItemWindowMs)).toEqual([]);
    });

    it('ends the pass early on a storage failure', async () => {
      const broken: TrackedItemStore = {
        ...store,
        upsert: async () => {
          throw new StorageError('upsert', { cause: new Error('disk full') });
        },
      };
      const agent = makeAgent({ store: broken });

      const summary = await agent.searchAndProcess();

      expect(summary.error).toBe('Storage operation "upsert" failed: disk full');
      expect(notify).not.toHaveBeenCalled();
      expect((await store.statistics(DAY_MS)).totalSearches).toBe(0);
      expect((await agent.getStatus()).lastPass).toBe(summary);
    });

    it('records a search even when nothing was fetched', async () => {
      const agent = makeAgent({ fetchers: [stubFetcher('booking', [])] });

      const summary = await agent.searchAndProcess();

      expect(summary).toMatchObject({ fetched: 0, kept: 0, newItems: 0, newItemsDelivered: null });
      expect((await store.statistics(DAY_MS)).totalSearches).toBe(1);
    });
  });

  describe('runPriceAlerts', () => {
    it('delivers a drop once', async () => {
      const agent = makeAgent();
      const id = await store.upsert(makeCandidate({ price: 125 }));
      clock.advance(DAY_MS);
      await store.upsert(makeCandidate({ price: 100 }));

      expect(await agent.runPriceAlerts()).toBe(1);
      expect(notify).toHaveBeenCalledWith({
        kind: 'price_drop',
        drops: [expect.objectContaining({ itemId: id, previousPrice: 125, currentPrice: 100, dropPercent: expect.closeTo(20) })],
      });

      clock.advance(30 * 60_000);
      expect(await agent.runPriceAlerts()).toBe(0);
      expect(notify).toHaveBeenCalledOnce();
    });

    it('returns 0 without notifying when nothing dropped', async () => {
      const agent = makeAgent();
      await store.upsert(makeCandidate({ price: 100 }));

      expect(await agent.runPriceAlerts()).toBe(0);
      expect(notify).not.toHaveBeenCalled();
    });
  });

  describe('cleanup', () => {
    it('prunes history past the retention window', async () => {
      const agent = makeAgent();
      await store.recordSearch(CRITERIA, 3, 120);
      clock.advance(31 * DAY_MS);

      expect(await agent.cleanup()).toEqual({ queryRecords: 1, priceObservations: 0, notificationRecords: 0 });
    });
  });

  describe('registerTasks', () => {
    it('registers the search, price alert, cleanup and heartbeat tasks', () => {
      const scheduler = new Scheduler({ now: clock.now });
      makeAgent().registerTasks(scheduler);

      expect(scheduler.getStatus().tasks.map((task) => [task.name, task.cadence])).toEqual([
        [TASK_NAMES.search, '6 hours'],
        [TASK_NAMES.priceAlerts, '30 minutes'],
        [TASK_NAMES.cleanup, '1 days'],
        [TASK_NAMES.heartbeat, '15 minutes'],
      ]);
    });

    it('leaves the heartbeat out when it has no cadence', () => {
      const scheduler = new Scheduler({ now: clock.now });
      makeAgent({ settings: { ...SETTINGS, schedule: { ...SETTINGS.schedule, heartbeat: null } } })
        .registerTasks(scheduler);

      expect(scheduler.getTask(TASK_NAMES.heartbeat)).toBeUndefined();
      expect(scheduler.getStatus().totalTasks).toBe(3);
    });

    it('runs a search pass when the scheduler dispatches it', async () => {
      const scheduler = new Scheduler({ now: clock.now });
      const agent = makeAgent();
      agent.registerTasks(scheduler);

      expect(scheduler.triggerTask(TASK_NAMES.search)).toBe('started');
      await scheduler.waitForIdle(5_000);

      const status = await agent.getStatus();
      expect(status.lastPass?.kept).toBe(2);
      expect(status.scheduler?.tasks[0]?.lastRun).toEqual(NOW);
    });
  });

  describe('getStatus', () => {
    it('reports criteria and sources before any pass', async () => {
      const status = await makeAgent().getStatus();

      expect(status.criteria).toMatchObject({
        destination: 'București, România',
        checkIn: '2026-11-01T00:00:00.000Z',
      });
      expect(status.sources).toEqual(['booking']);
      expect(status.lastPass).toBeNull();
      expect(status.scheduler).toBeNull();
      expect(status.statistics).toEqual({ totalSearches: 0, avgResultCount: 0, countsBySource: {} });
    });

    it('serves the last known statistics when the store is unavailable', async () => {
      const statistics = vi.fn(store.statistics);
      const agent = makeAgent({ store: { ...store, statistics } });
      await agent.searchAndProcess();

      const healthy = await agent.getStatus();
      clock.advance(HOUR_MS);
      statistics.mockRejectedValueOnce(new StorageError('statistics', { cause: new Error('connection lost') }));
      const degraded = await agent.getStatus();

      expect(degraded.statistics).toEqual(healthy.statistics);
      expect(degraded.statisticsUpdatedAt).toEqual(NOW);
      expect(healthy.statistics?.countsBySource).toEqual({ booking: 2 });
    });
  });

  describe('testNotify', () => {
    it('sends and records a test notification', async () => {
      const agent = makeAgent();

      expect(await agent.testNotify()).toBe(true);
      expect(notify).toHaveBeenCalledWith({ kind: 'test' });

      const [record] = await testDb.db.select().from(notificationRecords);
      expect(record).toMatchObject({ kind: 'test', success: true, error: null, itemIds: [] });
    });
  });

  describe('heartbeat', () => {
    it('logs the last pass time', async () => {
      const agent = makeAgent();
      agent.heartbeat();
      expect(console.log).toHaveBeenCalledWith('[agent] Heartbeat: alive, last search pass never');

      await agent.searchAndProcess();
      agent.heartbeat();
      expect(console.log).toHaveBeenCalledWith('[agent] Heartbeat: alive, last search pass 2026-03-01T12:00:00.000Z');
    });
  });
});
