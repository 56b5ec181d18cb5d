import { ReportServiceError } from '../lib/errors';
import { isValidLatitude, isValidLongitude } from './geo';
import type { Coordinate, LocationQuery } from './types';

const COORD_PREFIX = 'coord/';
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const CODE_PATTERN = /^[A-Z0-9]{3,4}$/;

export const parseCoordinate = (value: string): Coordinate => {
  const parts = value.split(',').map((part) => part.trim());

  if (parts.length !== 2 || !parts.every((part) => NUMBER_PATTERN.test(part))) {
    throw new ReportServiceError('InvalidInput', `"${value}" is not a valid coordinate pair`, {
      details: { param: 'coordinate', help: 'Coordinate pair. Ex: "12.34,-12.34"' },
    });
  }

  const latitude = Number.parseFloat(parts[0]);
  const longitude = Number.parseFloat(parts[1]);

  if (!isValidLatitude(latitude) || !isValidLongitude(longitude)) {
    throw new ReportServiceError(
      'InvalidInput',
      `(${latitude}, ${longitude}) is outside the valid latitude/longitude range`,
      { details: { param: 'coordinate', latitude, longitude } },
    );
  }

  return { latitude, longitude };
};

export const normalizeStationCode = (value: string): string => {
  const code = value.trim().toUpperCase();

  if (!CODE_PATTERN.test(code)) {
    throw new ReportServiceError('InvalidInput', `"${value}" is not a valid ICAO or IATA code`, {
      details: { param: 'station', help: 'ICAO station ID or coord pair. Ex: KJFK or "12.34,-12.34"' },
    });
  }

  return code;
};

/**
 * Classifies a client identifier as a station code or a coordinate pair.
 * Accepts `KJFK`, `JFK`, `coord/40.64,-73.78` and `40.64,-73.78`.
 */
export const parseLocation = (identifier: string): LocationQuery => {
  const trimmed = identifier.trim();

  if (trimmed.toLowerCase().startsWith(COORD_PREFIX)) {
    return { kind: 'coordinate', coordinate: parseCoordinate(trimmed.slice(COORD_PREFIX.length)) };
  }

  if (trimmed.includes(',')) {
    return { kind: 'coordinate', coordinate: parseCoordinate(trimmed) };
  }

  return { kind: 'code', code: normalizeStationCode(trimmed) };
};

export const MAX_MULTI_STATIONS = 10;

/** Comma-separated station codes for multi-station requests, deduplicated in order. */
export const parseStationList = (value: string): string[] => {
  const codes = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

  if (codes.length === 0) {
    throw new ReportServiceError('InvalidInput', 'No station codes were given', {
      details: { param: 'stations', help: 'Comma-separated ICAO codes. Ex: KJFK,KLGA' },
    });
  }

  if (codes.length > MAX_MULTI_STATIONS) {
    throw new ReportServiceError(
      'InvalidInput',
      `Multi requests are limited to ${MAX_MULTI_STATIONS} stations or less`,
      { details: { param: 'stations', count: codes.length } },
    );
  }

  return Array.from(new Set(codes.map(normalizeStationCode)));
};
