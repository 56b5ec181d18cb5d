import { fetch, type Dispatcher, type Response } from 'undici';

import type { Station } from '../stations/types';
import {
  SourceUnavailableError,
  type RawReport,
  type RawReportSource,
  type ReportType,
} from './types';

const PATHS: Record<ReportType, string> = {
  metar: 'observations/metar/stations',
  taf: 'forecasts/taf/stations',
};

const TIMESTAMP_LINE = /^\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}$/;

type NoaaReportSourceOptions = {
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
  userAgent?: string;
};

/**
 * Splits a station text product into its timestamp header and report body.
 * METAR bodies are folded onto one line; TAF line breaks are kept.
 */
export const parseStationProduct = (
  reportType: ReportType,
  contents: string,
): { publishedAt: string | null; text: string } | null => {
  const lines = contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  if (lines.length === 0) {
    return null;
  }

  const hasHeader = TIMESTAMP_LINE.test(lines[0]);
  const publishedAt = hasHeader ? lines[0] : null;
  const body = hasHeader ? lines.slice(1) : lines;

  if (body.length === 0) {
    return null;
  }

  return {
    publishedAt,
    text: body.join(reportType === 'taf' ? '\n' : ' '),
  };
};

export class NoaaReportSource implements RawReportSource {
  readonly name = 'NOAA';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly userAgent: string;

  constructor(options: NoaaReportSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.dispatcher = options.dispatcher;
    this.userAgent = options.userAgent ?? 'wx-report-gateway';
  }

  urlFor(reportType: ReportType, station: Station): string {
    return `${this.baseUrl}/${PATHS[reportType]}/${station.icao}.TXT`;
  }

  async fetchRaw(reportType: ReportType, station: Station): Promise<RawReport | null> {
    const url = this.urlFor(reportType, station);
    // Covers the body as well as the headers.
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'user-agent': this.userAgent, accept: 'text/plain' },
        signal,
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      throw this.unavailable(signal, error);
    }

    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new SourceUnavailableError(
        this.name,
        `Report source returned ${response.status} for ${station.icao}`,
      );
    }

    let contents: string;
    try {
      contents = await response.text();
    } catch (error) {
      throw this.unavailable(signal, error);
    }

    const product = parseStationProduct(reportType, contents);
    if (!product) {
      return null;
    }

    return { ...product, source: this.name };
  }

  private unavailable(signal: AbortSignal, error: unknown): SourceUnavailableError {
    const reason = signal.aborted ? `timed out after ${this.timeoutMs}ms` : 'could not be reached';
    return new SourceUnavailableError(this.name, `Report source ${reason}`, { cause: error });
  }
}
