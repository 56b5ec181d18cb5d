import type { Station, StationIndexStatus } from '../stations/types';
import type { DispatchResult, MultiDispatchResult } from './reportDispatcher';

export const RESPONSE_FORMATS = ['json', 'text'] as const;
export type ResponseFormat = (typeof RESPONSE_FORMATS)[number];

export type StationInfo = Station;

export type ReportMeta = {
  timestamp: string;
  /** Set only when the report was served from the cache. */
  cacheTimestamp: string | null;
  stationsUpdated: string | null;
};

export type RenderedReport = {
  meta: ReportMeta;
  info?: StationInfo;
  [field: string]: unknown;
};

type RenderableReport = Pick<DispatchResult, 'station' | 'report' | 'options' | 'cacheHit' | 'fetchedAt'>;

export type MultiRenderedReport = {
  meta: ReportMeta;
  data: Record<string, RenderedReport | { error: string; message: string }>;
};

export const toStationInfo = (station: Station): StationInfo => ({ ...station });

export const buildMeta = (
  now: number,
  cacheTimestamp: number | null,
  stations: StationIndexStatus,
): ReportMeta => ({
  timestamp: new Date(now).toISOString(),
  cacheTimestamp: cacheTimestamp === null ? null : new Date(cacheTimestamp).toISOString(),
  stationsUpdated: stations.loadedAt,
});

export const renderJson = (
  result: RenderableReport,
  now: number,
  stations: StationIndexStatus,
): RenderedReport => {
  const rendered: RenderedReport = {
    ...result.report,
    meta: buildMeta(now, result.cacheHit ? result.fetchedAt : null, stations),
  };

  if (result.options.includes('info')) {
    rendered.info = toStationInfo(result.station);
  }

  return rendered;
};

const describeValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '-';
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
};

/**
 * Plain-text rendering: the raw report on the first line, then one
 * `field: value` line per remaining field. Station info is appended when asked for.
 */
export const renderText = (result: RenderableReport): string => {
  const { raw, ...fields } = result.report;
  const lines: string[] = [];

  if (typeof raw === 'string') {
    lines.push(raw);
  }

  for (const [name, value] of Object.entries(fields)) {
    lines.push(`${name}: ${describeValue(value)}`);
  }

  if (result.options.includes('info')) {
    const { station } = result;
    lines.push(`info: ${[station.icao, station.name, station.city, station.country].filter(Boolean).join(', ')}`);
  }

  return `${lines.join('\n')}\n`;
};

/** One entry per station, keyed by ICAO code; failed stations carry their error instead. */
export const renderMultiJson = (
  result: MultiDispatchResult,
  now: number,
  stations: StationIndexStatus,
): MultiRenderedReport => {
  const data: MultiRenderedReport['data'] = {};

  for (const entry of result.reports) {
    data[entry.station.icao] = entry.ok
      ? renderJson({ ...entry, options: result.options }, now, stations)
      : { error: entry.error.kind, message: entry.error.message };
  }

  return { meta: buildMeta(now, null, stations), data };
};

export const renderMultiText = (result: MultiDispatchResult): string =>
  result.reports
    .map((entry) =>
      entry.ok
        ? `${entry.station.icao}\n${renderText({ ...entry, options: result.options })}`
        : `${entry.station.icao}\nerror: ${entry.error.message}\n`,
    )
    .join('\n');
