import { ReportServiceError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { Station } from '../stations/types';
import {
  ReportParseError,
  SourceUnavailableError,
  type ParsedReport,
  type ParsingEngine,
  type RawReport,
  type RawReportSource,
  type ReportOption,
  type ReportType,
} from './types';

export type FetchedReport = {
  data: ParsedReport;
  source: string;
  publishedAt: string | null;
};

type UpstreamFetcherOptions = {
  source: RawReportSource;
  engine: ParsingEngine;
  logger?: Logger;
};

export class UpstreamFetcher {
  private readonly source: RawReportSource;
  private readonly engine: ParsingEngine;
  private readonly logger: Logger;

  constructor(options: UpstreamFetcherOptions) {
    this.source = options.source;
    this.engine = options.engine;
    this.logger = options.logger ?? console;
  }

  async fetch(
    reportType: ReportType,
    station: Station,
    options: readonly ReportOption[],
  ): Promise<FetchedReport> {
    const label = reportType.toUpperCase();

    if (!station.reporting) {
      throw new ReportServiceError('NotFound', `${station.icao} does not publish reports`, {
        details: { station: station.icao },
      });
    }

    let raw: RawReport | null;
    try {
      raw = await this.source.fetchRaw(reportType, station);
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        this.logger.warn(`[Upstream] ${label} fetch for ${station.icao} failed: ${error.message}`);
        throw new ReportServiceError(
          'ServiceUnavailable',
          `Unable to fetch ${label} from ${error.source}`,
          { cause: error },
        );
      }

      this.logger.error(`[Upstream] Unexpected ${label} fetch error for ${station.icao}`, error);
      throw new ReportServiceError('InternalError', `Unknown error fetching ${label}`, {
        cause: error,
      });
    }

    if (!raw) {
      throw new ReportServiceError(
        'NotFound',
        `No ${label} reports were found for ${station.icao}`,
        { details: { station: station.icao, reportType } },
      );
    }

    try {
      const data = this.engine.parse(raw.text, station, { reportType, options });
      return { data, source: raw.source, publishedAt: raw.publishedAt };
    } catch (error) {
      if (error instanceof ReportParseError) {
        this.logger.warn(`[Upstream] Could not parse ${label} for ${station.icao}: ${error.message}`);
        throw new ReportServiceError('UpstreamParseError', `Could not parse ${label} report`, {
          details: { raw: error.raw, reason: error.message },
          cause: error,
        });
      }

      this.logger.error(`[Upstream] Parsing engine failed on ${label} for ${station.icao}`, error);
      throw new ReportServiceError('InternalError', `Unknown error parsing ${label} report`, {
        cause: error,
      });
    }
  }
}
