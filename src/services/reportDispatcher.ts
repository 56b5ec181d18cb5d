import type { CoalescingCache } from '../cache/coalescingCache';
import { buildCacheKey, normalizeOptions } from '../cache/cacheKey';
import { systemClock, type Clock } from '../lib/clock';
import { ReportServiceError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { QuotaLedger } from '../quota/quotaLedger';
import type { QuotaWindow } from '../quota/types';
import { parseLocation, parseStationList } from '../stations/location';
import type { StationIndex } from '../stations/stationIndex';
import type { Station } from '../stations/types';
import type { FetchedReport, UpstreamFetcher } from '../upstream/reportFetcher';
import { extractStationCode, rejectNonReport } from '../upstream/rawTextEngine';
import {
  ReportParseError,
  type ParsedReport,
  type ParsingEngine,
  type ReportOption,
  type ReportType,
} from '../upstream/types';

export type RequestState =
  | 'Received'
  | 'Validated'
  | 'Resolved'
  | 'Admitted'
  | 'CacheHit'
  | 'Fetching'
  | 'Fetched'
  | 'FetchFailed'
  | 'Responded'
  | 'Rejected';

export type ReportRequest = {
  reportType: ReportType;
  identifier: string;
  options?: string | readonly string[];
  token?: string | null;
  clientId?: string;
  signal?: AbortSignal;
};

export type ParseRequest = {
  reportType: ReportType;
  rawText: string;
  options?: string | readonly string[];
  token?: string | null;
  clientId?: string;
};

export type MultiReportRequest = {
  reportType: ReportType;
  /** Comma-separated station codes. */
  stations: string;
  options?: string | readonly string[];
  token?: string | null;
  clientId?: string;
  signal?: AbortSignal;
};

export type DispatchResult = {
  station: Station;
  report: ParsedReport;
  source: string | null;
  options: ReportOption[];
  cacheHit: boolean;
  fetchedAt: number;
  window: QuotaWindow;
  trace: RequestState[];
};

export type StationReport =
  | {
      ok: true;
      station: Station;
      report: ParsedReport;
      source: string;
      cacheHit: boolean;
      fetchedAt: number;
    }
  | {
      ok: false;
      station: Station;
      error: ReportServiceError;
    };

export type MultiDispatchResult = {
  reports: StationReport[];
  options: ReportOption[];
  window: QuotaWindow;
  trace: RequestState[];
};

const toServiceError = (error: unknown): ReportServiceError =>
  error instanceof ReportServiceError
    ? error
    : new ReportServiceError('InternalError', 'Unknown error fetching report', { cause: error });

type ReportDispatcherOptions = {
  stations: StationIndex;
  ledger: QuotaLedger;
  cache: CoalescingCache<FetchedReport>;
  fetcher: UpstreamFetcher;
  engine: ParsingEngine;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Runs one client request through validation, station resolution, quota
 * admission and the report cache. Each step that can reject runs before the
 * next one starts, so a rejected request never reaches the cache or upstream.
 */
export class ReportDispatcher {
  private readonly stations: StationIndex;
  private readonly ledger: QuotaLedger;
  private readonly cache: CoalescingCache<FetchedReport>;
  private readonly fetcher: UpstreamFetcher;
  private readonly engine: ParsingEngine;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ReportDispatcherOptions) {
    this.stations = options.stations;
    this.ledger = options.ledger;
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.engine = options.engine;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
  }

  async dispatch(request: ReportRequest): Promise<DispatchResult> {
    const trace: RequestState[] = ['Received'];

    try {
      const location = parseLocation(request.identifier);
      const options = normalizeOptions(request.options);
      trace.push('Validated');

      const station = this.stations.resolve(location);
      trace.push('Resolved');

      const { window } = await this.ledger.admit(request.token, { clientId: request.clientId });
      trace.push('Admitted');

      const onFetch = () => {
        trace.push('Fetching');
      };

      const lookup = await this.lookupReport(
        request.reportType,
        station,
        options,
        request.signal,
        onFetch,
      ).catch((error: unknown) => {
        trace.push('FetchFailed');
        throw error;
      });

      if (lookup.hit) {
        trace.push('CacheHit');
      } else if (trace.includes('Fetching')) {
        trace.push('Fetched');
      } else {
        // Joined a fetch another request started.
        trace.push('Fetching', 'Fetched');
      }

      trace.push('Responded');

      return {
        station,
        report: lookup.value.data,
        source: lookup.value.source,
        options,
        cacheHit: lookup.hit,
        fetchedAt: lookup.fetchedAt,
        window,
        trace,
      };
    } catch (error) {
      if (!trace.includes('FetchFailed')) {
        trace.push('Rejected');
      }

      this.logger.info(
        `[Dispatcher] ${request.reportType} ${request.identifier} ended after ${trace.join(' > ')}`,
      );
      throw error;
    }
  }

  /**
   * Reports for several stations, charged as one request. Every station is
   * looked up through the cache on its own; one failing station does not
   * affect the others.
   */
  async dispatchMany(request: MultiReportRequest): Promise<MultiDispatchResult> {
    const trace: RequestState[] = ['Received'];

    try {
      const codes = parseStationList(request.stations);
      const options = normalizeOptions(request.options);
      trace.push('Validated');

      const stations = codes.map((code) => this.stations.resolveByCode(code));
      trace.push('Resolved');

      const { window } = await this.ledger.admit(request.token, { clientId: request.clientId });
      trace.push('Admitted');

      const settled = await Promise.allSettled(
        stations.map((station) =>
          this.lookupReport(request.reportType, station, options, request.signal),
        ),
      );

      const reports = stations.map((station, index): StationReport => {
        const outcome = settled[index];
        if (outcome.status === 'fulfilled') {
          return {
            ok: true,
            station,
            report: outcome.value.value.data,
            source: outcome.value.value.source,
            cacheHit: outcome.value.hit,
            fetchedAt: outcome.value.fetchedAt,
          };
        }

        return { ok: false, station, error: toServiceError(outcome.reason) };
      });

      trace.push('Responded');

      return { reports, options, window, trace };
    } catch (error) {
      trace.push('Rejected');
      this.logger.info(
        `[Dispatcher] multi ${request.reportType} ${request.stations} ended after ${trace.join(' > ')}`,
      );
      throw error;
    }
  }

  /** Parses a report the client supplied. Quota applies; nothing is cached. */
  async parse(request: ParseRequest): Promise<DispatchResult> {
    const trace: RequestState[] = ['Received'];

    try {
      const rejection = rejectNonReport(request.rawText);
      if (rejection) {
        throw new ReportServiceError('InvalidInput', rejection, {
          details: { param: 'report', help: 'Raw report string' },
        });
      }

      const code = extractStationCode(request.rawText);
      if (!code) {
        throw new ReportServiceError('InvalidInput', 'Could not find a station code in the report', {
          details: { param: 'report' },
        });
      }

      const options = normalizeOptions(request.options);
      trace.push('Validated');

      const station = this.stations.resolveByCode(code);
      trace.push('Resolved');

      const { window } = await this.ledger.admit(request.token, { clientId: request.clientId });
      trace.push('Admitted');

      let report: ParsedReport;
      try {
        report = this.engine.parse(request.rawText, station, {
          reportType: request.reportType,
          options,
        });
      } catch (error) {
        if (error instanceof ReportParseError) {
          throw new ReportServiceError('InvalidInput', error.message, {
            details: { param: 'report', raw: error.raw },
          });
        }

        throw error;
      }

      trace.push('Responded');

      return {
        station,
        report,
        source: null,
        options,
        cacheHit: false,
        fetchedAt: this.clock(),
        window,
        trace,
      };
    } catch (error) {
      trace.push('Rejected');
      throw error;
    }
  }

  // Only options the engine honours reach the cache key and the engine.
  private lookupReport(
    reportType: ReportType,
    station: Station,
    options: readonly ReportOption[],
    signal: AbortSignal | undefined,
    onFetch?: () => void,
  ) {
    const engineOptions = options.filter((option) => this.engine.supportedOptions.includes(option));

    return this.cache.getOrFetch(
      buildCacheKey(reportType, station.icao, engineOptions),
      () => {
        onFetch?.();
        return this.fetcher.fetch(reportType, station, engineOptions);
      },
      { signal },
    );
  }
}
