import type { TelemetryClient } from 'applicationinsights';

import { CoalescingCache } from '../cache/coalescingCache';
import type { AppConfig } from '../config';
import { systemClock, type Clock } from '../lib/clock';
import type { Logger } from '../lib/logger';
import { getSupabaseClient } from '../lib/supabase';
import { InMemoryAccountStore } from '../quota/accountStore';
import { QuotaLedger } from '../quota/quotaLedger';
import { SupabaseAccountStore } from '../quota/supabaseAccountStore';
import type { AccountStore } from '../quota/types';
import { createUsageWindows } from '../quota/usageWindows';
import { StationIndex } from '../stations/stationIndex';
import { FileStationSource, HttpStationSource } from '../stations/stationSource';
import type { StationSource } from '../stations/types';
import { NoaaReportSource } from '../upstream/noaaReportSource';
import { RawTextEngine } from '../upstream/rawTextEngine';
import { UpstreamFetcher, type FetchedReport } from '../upstream/reportFetcher';
import type { ParsingEngine, RawReportSource } from '../upstream/types';
import { ReportDispatcher } from './reportDispatcher';
import { createRefreshTelemetryHooks } from './refreshTelemetry';
import { RefreshInProgressError, StationRefreshService } from './stationRefreshService';
import type { ScheduledTask } from './taskScheduler';

export type Services = {
  config: AppConfig;
  clock: Clock;
  stations: StationIndex;
  stationRefresh: StationRefreshService;
  ledger: QuotaLedger;
  reportCache: CoalescingCache<FetchedReport>;
  dispatcher: ReportDispatcher;
};

export type ServiceOverrides = {
  clock?: Clock;
  logger?: Logger;
  stations?: StationIndex;
  stationSource?: StationSource;
  accountStore?: AccountStore;
  reportSource?: RawReportSource;
  engine?: ParsingEngine;
  telemetry?: TelemetryClient | null;
};

const createStationSource = (config: AppConfig): StationSource =>
  config.stations.url
    ? new HttpStationSource({ url: config.stations.url })
    : new FileStationSource(config.stations.file);

/** Supabase when configured, then the accounts file, otherwise an empty store. */
export const createAccountStore = async (config: AppConfig): Promise<AccountStore> => {
  const supabase = getSupabaseClient(config);
  if (supabase) {
    return new SupabaseAccountStore(supabase);
  }

  if (config.accounts.file) {
    return InMemoryAccountStore.fromFile(config.accounts.file);
  }

  return new InMemoryAccountStore();
};

/** Wires every component once; tests swap collaborators through `overrides`. */
export const createServices = (config: AppConfig, overrides: ServiceOverrides = {}): Services => {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? console;
  const stations = overrides.stations ?? new StationIndex();

  const stationRefresh = new StationRefreshService({
    index: stations,
    source: overrides.stationSource ?? createStationSource(config),
    logger,
    metrics: overrides.telemetry ? createRefreshTelemetryHooks(overrides.telemetry) : undefined,
  });

  const ledger = new QuotaLedger({
    store: overrides.accountStore ?? new InMemoryAccountStore(),
    windows: createUsageWindows(config.quota.policy, config.quota.windowSeconds * 1000),
    allowAnonymous: config.quota.allowAnonymous,
    anonymousLimit: config.quota.anonymousLimit,
    accountCacheTtlMs: config.quota.accountCacheTtlSeconds * 1000,
    clock,
    logger,
  });

  const reportCache = new CoalescingCache<FetchedReport>({
    ttlMs: config.reportCache.ttlSeconds * 1000,
    maxEntries: config.reportCache.maxEntries,
    clock,
  });

  const engine = overrides.engine ?? new RawTextEngine(clock);
  const fetcher = new UpstreamFetcher({
    source:
      overrides.reportSource ??
      new NoaaReportSource({
        baseUrl: config.upstream.baseUrl,
        timeoutMs: config.upstream.timeoutMs,
      }),
    engine,
    logger,
  });

  const dispatcher = new ReportDispatcher({
    stations,
    ledger,
    cache: reportCache,
    fetcher,
    engine,
    clock,
    logger,
  });

  return { config, clock, stations, stationRefresh, ledger, reportCache, dispatcher };
};

/** Periodic work for the scheduler: station refresh when enabled, cache sweep and quota pruning. */
export const createMaintenanceTasks = (services: Services, logger: Logger = console): ScheduledTask[] => {
  const { config } = services;
  const tasks: ScheduledTask[] = [];

  if (config.stations.refresh.enabled) {
    tasks.push({
      name: 'station-refresh',
      intervalMs: Math.max(config.stations.refresh.intervalMinutes, 1) * 60_000,
      run: async () => {
        try {
          const result = await services.stationRefresh.refresh('scheduled');
          return `loaded ${result.stations} stations from ${result.source}`;
        } catch (error) {
          if (error instanceof RefreshInProgressError) {
            logger.warn('[Scheduler] Station refresh already in progress, skipping scheduled run');
            return undefined;
          }

          throw error;
        }
      },
    });
  } else {
    logger.info('[Scheduler] Station refresh disabled via configuration');
  }

  const sweepMs = config.reportCache.sweepIntervalSeconds * 1000;
  if (sweepMs > 0) {
    tasks.push(
      {
        name: 'report-cache-sweep',
        intervalMs: sweepMs,
        run: () => {
          const removed = services.reportCache.sweep();
          return removed > 0 ? `removed ${removed} expired reports` : undefined;
        },
      },
      {
        name: 'quota-prune',
        intervalMs: sweepMs,
        run: () => {
          const removed = services.ledger.prune();
          return removed > 0 ? `pruned ${removed} idle quota records` : undefined;
        },
      },
    );
  }

  return tasks;
};
