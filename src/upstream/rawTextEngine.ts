import { systemClock, type Clock } from '../lib/clock';
import type { Station } from '../stations/types';
import {
  ReportParseError,
  type ParseContext,
  type ParsedReport,
  type ParsingEngine,
  type ReportOption,
} from './types';

const PREFIXES = new Set(['METAR', 'SPECI', 'TAF']);
const MODIFIERS = new Set(['AMD', 'COR', 'RTD']);
const TIME_PATTERN = /^(\d{2})(\d{2})(\d{2})Z$/;
const VALIDITY_PATTERN = /^(\d{2})(\d{2})\/(\d{2})(\d{2})$/;

type ReportTime = {
  repr: string;
  dt: string | null;
};

const tokenize = (raw: string) => raw.trim().split(/\s+/).filter(Boolean);

const stripPrefixes = (tokens: string[]): string[] => {
  let index = 0;
  while (index < tokens.length && (PREFIXES.has(tokens[index]) || MODIFIERS.has(tokens[index]))) {
    index += 1;
  }

  return tokens.slice(index);
};

/** Station code at the start of a raw report, after any METAR/SPECI/TAF prefix. */
export const extractStationCode = (raw: string): string | null => {
  const [first] = stripPrefixes(tokenize(raw.toUpperCase()));
  return first && /^[A-Z0-9]{4}$/.test(first) ? first : null;
};

/** Returns a reason when the text does not look like a raw report at all. */
export const rejectNonReport = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (trimmed.length < 4 || trimmed.includes('{') || trimmed.includes('[')) {
    return "Doesn't look like the raw report string";
  }

  return null;
};

// Report times carry only day/hour/minute; anchor them to the current UTC month,
// rolling back a month when the day is ahead of today.
const resolveReportTime = (repr: string, now: Date): ReportTime => {
  const match = TIME_PATTERN.exec(repr);
  if (!match) {
    return { repr, dt: null };
  }

  const [day, hour, minute] = match.slice(1).map((part) => Number.parseInt(part, 10));
  if (day < 1 || day > 31 || hour > 23 || minute > 59) {
    return { repr, dt: null };
  }

  const monthOffset = day > now.getUTCDate() + 1 ? -1 : 0;
  const dt = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + monthOffset, day, hour, minute),
  );

  return { repr, dt: dt.toISOString() };
};

/**
 * Minimal engine: checks the report header against the requested station and
 * splits out the issue time, TAF validity period and remarks. Decoding is left
 * to richer engines behind the same interface.
 *
 * `summary`, `speech` and `translate` need a decoding engine; here they are
 * accepted and ignored, so every option set shares one cached report.
 */
export class RawTextEngine implements ParsingEngine {
  readonly supportedOptions: readonly ReportOption[] = [];
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  parse(rawText: string, station: Station, context: ParseContext): ParsedReport {
    const rejection = rejectNonReport(rawText);
    if (rejection) {
      throw new ReportParseError(rejection, rawText);
    }

    const raw = rawText.trim().replace(/\s+/g, ' ');
    const tokens = stripPrefixes(tokenize(raw.toUpperCase()));
    const [code, ...rest] = tokens;

    if (code !== station.icao) {
      throw new ReportParseError(
        `Report is for ${code ?? 'an unknown station'}, expected ${station.icao}`,
        rawText,
      );
    }

    const timeToken = rest[0] && TIME_PATTERN.test(rest[0]) ? rest.shift() : undefined;
    if (context.reportType === 'metar' && !timeToken) {
      throw new ReportParseError(`Could not find the issue time in the METAR for ${code}`, rawText);
    }

    const validityToken =
      context.reportType === 'taf' && rest[0] && VALIDITY_PATTERN.test(rest[0])
        ? rest.shift()
        : undefined;

    const remarksIndex = rest.indexOf('RMK');
    const body = remarksIndex === -1 ? rest : rest.slice(0, remarksIndex);
    const remarks = remarksIndex === -1 ? null : rest.slice(remarksIndex + 1).join(' ') || null;

    return {
      raw,
      station: code,
      type: context.reportType,
      time: timeToken ? resolveReportTime(timeToken, new Date(this.clock())) : null,
      validity: validityToken ?? null,
      body: body.join(' '),
      remarks,
    };
  }
}
