import type { Logger } from '../lib/logger';
import type { StationIndex } from '../stations/stationIndex';
import type { StationSource } from '../stations/types';

export type RefreshTrigger = 'startup' | 'manual' | 'scheduled';

export type RefreshResult = {
  trigger: RefreshTrigger;
  stations: number;
  source: string;
  durationMs: number;
  startedAt: Date;
  loadedAt: Date;
};

type MetricsHooks = {
  onSuccess?: (options: { durationMs: number; stations: number; trigger: RefreshTrigger }) => void;
  onFailure?: (options: { durationMs: number; error: unknown; trigger: RefreshTrigger }) => void;
};

type StationRefreshServiceOptions = {
  index: StationIndex;
  source: StationSource;
  logger?: Logger;
  metrics?: MetricsHooks;
};

export class RefreshInProgressError extends Error {
  constructor() {
    super('Station index refresh is already in progress');
    this.name = 'RefreshInProgressError';
  }
}

export class StationRefreshService {
  private readonly index: StationIndex;
  private readonly source: StationSource;
  private readonly logger: Logger;
  private readonly metrics?: MetricsHooks;

  private currentRefresh: Promise<RefreshResult> | null = null;

  constructor(options: StationRefreshServiceOptions) {
    this.index = options.index;
    this.source = options.source;
    this.logger = options.logger ?? console;
    this.metrics = options.metrics;
  }

  isRunning(): boolean {
    return this.currentRefresh !== null;
  }

  async refresh(trigger: RefreshTrigger = 'manual'): Promise<RefreshResult> {
    if (this.currentRefresh) {
      throw new RefreshInProgressError();
    }

    const refreshPromise = this.executeRefresh(trigger);
    this.currentRefresh = refreshPromise;

    try {
      return await refreshPromise;
    } finally {
      if (this.currentRefresh === refreshPromise) {
        this.currentRefresh = null;
      }
    }
  }

  private async executeRefresh(trigger: RefreshTrigger): Promise<RefreshResult> {
    const startedAt = new Date();

    this.logger.info(`[Stations] Starting ${trigger} refresh from ${this.source.description}`);

    try {
      const stations = await this.source.listAllStations();
      const loadedAt = new Date();
      const count = this.index.load(stations, this.source.description, loadedAt);
      const durationMs = Date.now() - startedAt.getTime();

      this.logger.info(
        `[Stations] Completed ${trigger} refresh in ${durationMs}ms (stations=${count})`,
      );
      this.metrics?.onSuccess?.({ durationMs, stations: count, trigger });

      return {
        trigger,
        stations: count,
        source: this.source.description,
        durationMs,
        startedAt,
        loadedAt,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt.getTime();
      const keepsPrevious = this.index.isLoaded() ? ' (previous snapshot kept)' : '';

      this.logger.error(`[Stations] ${trigger} refresh failed${keepsPrevious}`, error);
      this.metrics?.onFailure?.({ durationMs, error, trigger });
      throw error;
    }
  }
}
