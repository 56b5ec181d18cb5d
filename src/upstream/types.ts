import type { Station } from '../stations/types';

export const REPORT_TYPES = ['metar', 'taf'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const REPORT_OPTIONS = ['info', 'speech', 'summary', 'translate'] as const;
export type ReportOption = (typeof REPORT_OPTIONS)[number];

/** Opaque engine output; the gateway never looks inside beyond rendering it. */
export type ParsedReport = Record<string, unknown>;

export type RawReport = {
  text: string;
  /** Timestamp line published alongside the report, when the source has one. */
  publishedAt: string | null;
  source: string;
};

export type ParseContext = {
  reportType: ReportType;
  options: readonly ReportOption[];
};

export interface ParsingEngine {
  /** Options that change the engine's output; the rest never split the report cache. */
  readonly supportedOptions: readonly ReportOption[];
  parse(rawText: string, station: Station, context: ParseContext): ParsedReport;
}

export interface RawReportSource {
  readonly name: string;
  fetchRaw(reportType: ReportType, station: Station): Promise<RawReport | null>;
}

export class ReportParseError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'ReportParseError';
    this.raw = raw;
  }
}

export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}
