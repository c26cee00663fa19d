import { ConfigError, DAY_MS, HOUR_MS } from '@stayhound/shared';
import type { SearchCriteria } from '@stayhound/shared';
import type { AgentSettings } from './agent.js';

export type RunMode = 'daemon' | 'once';

export interface ScheduleConfig {
  searchIntervalHours: number;
  priceAlertIntervalMinutes: number;
  cleanupIntervalDays: number;
  /** 0 disables the heartbeat task. */
  heartbeatIntervalMinutes: number;
  tickSeconds: number;
}

export interface AgentConfig {
  databaseUrl: string;
  telegramBotToken: string;
  telegramChatId: string;
  criteria: SearchCriteria;
  sources: string[];
  proxyUrl: string | undefined;
  schedule: ScheduleConfig;
  newItemWindowHours: number;
  priceDropThresholdPercent: number;
  /** Listings at or under this price, in the criteria currency, get their own alert. */
  targetPrice: number | null;
  retentionDays: number;
  httpPort: number;
  runMode: RunMode;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const val = env[name];
  if (!val) throw new ConfigError(`Missing required env var: ${name}`);
  return val;
}

function optional(env: Env, name: string): string | undefined {
  const val = env[name]?.trim();
  return val ? val : undefined;
}

function numberVar(env: Env, name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;

  const val = Number(raw);
  const min = opts.min ?? 0;
  if (!Number.isFinite(val) || val < min || (opts.integer && !Number.isInteger(val))) {
    const kind = opts.integer ? 'an integer' : 'a number';
    throw new ConfigError(`${name} must be ${kind} >= ${min}, got "${raw}"`);
  }
  return val;
}

function optionalNumberVar(env: Env, name: string): number | null {
  if (optional(env, name) === undefined) return null;
  return numberVar(env, name, 0);
}

function listVar(env: Env, name: string, fallback: string[]): string[] {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const items = raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  if (items.length === 0) throw new ConfigError(`${name} must list at least one value`);
  return items;
}

function dateVar(env: Env, name: string, fallback: Date): Date {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const val = new Date(raw);
  if (Number.isNaN(val.getTime())) throw new ConfigError(`${name} must be an ISO date, got "${raw}"`);
  return val;
}

function isRunMode(value: string): value is RunMode {
  return value === 'daemon' || value === 'once';
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function loadConfig(env: Env = process.env, today: Date = new Date()): AgentConfig {
  const day = startOfUtcDay(today);
  const checkIn = dateVar(env, 'SEARCH_CHECK_IN', new Date(day.getTime() + 30 * DAY_MS));
  const checkOut = dateVar(env, 'SEARCH_CHECK_OUT', new Date(checkIn.getTime() + 2 * DAY_MS));
  if (checkOut.getTime() <= checkIn.getTime()) {
    throw new ConfigError('SEARCH_CHECK_OUT must be after SEARCH_CHECK_IN');
  }

  const runMode = optional(env, 'RUN_MODE') ?? 'daemon';
  if (!isRunMode(runMode)) {
    throw new ConfigError(`RUN_MODE must be "daemon" or "once", got "${runMode}"`);
  }

  return {
    databaseUrl: required(env, 'DATABASE_URL'),
    telegramBotToken: required(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: required(env, 'TELEGRAM_CHAT_ID'),
    criteria: {
      destination: optional(env, 'SEARCH_DESTINATION') ?? 'București, România',
      checkIn,
      checkOut,
      guests: numberVar(env, 'SEARCH_GUESTS', 2, { min: 1, integer: true }),
      maxPrice: numberVar(env, 'SEARCH_MAX_PRICE', 500),
      currency: (optional(env, 'SEARCH_CURRENCY') ?? 'RON').toUpperCase(),
      propertyTypes: listVar(env, 'SEARCH_PROPERTY_TYPES', ['hotel', 'apartment']),
      minRating: numberVar(env, 'SEARCH_MIN_RATING', 7),
    },
    sources: listVar(env, 'SOURCES', ['booking']),
    proxyUrl: optional(env, 'PROXY_URL'),
    schedule: {
      searchIntervalHours: numberVar(env, 'SEARCH_INTERVAL_HOURS', 6, { min: 1, integer: true }),
      priceAlertIntervalMinutes: numberVar(env, 'PRICE_ALERT_INTERVAL_MINUTES', 30, { min: 1, integer: true }),
      cleanupIntervalDays: numberVar(env, 'CLEANUP_INTERVAL_DAYS', 1, { min: 1, integer: true }),
      heartbeatIntervalMinutes: numberVar(env, 'HEARTBEAT_INTERVAL_MINUTES', 15, { integer: true }),
      tickSeconds: numberVar(env, 'SCHEDULER_TICK_SECONDS', 30, { min: 1 }),
    },
    newItemWindowHours: numberVar(env, 'NEW_ITEM_WINDOW_HOURS', 24, { min: 1 }),
    priceDropThresholdPercent: numberVar(env, 'PRICE_DROP_THRESHOLD_PERCENT', 10),
    targetPrice: optionalNumberVar(env, 'SEARCH_TARGET_PRICE'),
    retentionDays: numberVar(env, 'RETENTION_DAYS', 30, { min: 1, integer: true }),
    httpPort: numberVar(env, 'HTTP_PORT', 3000, { integer: true }),
    runMode,
  };
}

export function toAgentSettings(config: AgentConfig): AgentSettings {
  const { schedule } = config;
  return {
    newItemWindowMs: config.newItemWindowHours * HOUR_MS,
    priceDropThresholdPercent: config.priceDropThresholdPercent,
    targetPrice: config.targetPrice,
    retentionMs: config.retentionDays * DAY_MS,
    schedule: {
      search: { value: schedule.searchIntervalHours, unit: 'hours' },
      priceAlerts: { value: schedule.priceAlertIntervalMinutes, unit: 'minutes' },
      cleanup: { value: schedule.cleanupIntervalDays, unit: 'days' },
      heartbeat: schedule.heartbeatIntervalMinutes > 0
        ? { value: schedule.heartbeatIntervalMinutes, unit: 'minutes' }
        : null,
    },
  };
}
