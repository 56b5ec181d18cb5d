import { ReportServiceError } from '../lib/errors';
import { haversineKm, isValidLatitude, isValidLongitude, kmToNauticalMiles } from './geo';
import { normalizeStationCode } from './location';
import type {
  Coordinate,
  LocationQuery,
  Station,
  StationDistance,
  StationIndexStatus,
} from './types';

type StationSnapshot = {
  readonly stations: readonly Station[];
  readonly byIcao: ReadonlyMap<string, Station>;
  readonly byIata: ReadonlyMap<string, Station>;
  readonly loadedAt: Date;
  readonly source: string;
};

type NearestOptions = {
  reportingOnly?: boolean;
};

// Equal distances fall back to the smallest identifier so repeated queries agree.
const compareByDistance = (a: StationDistance, b: StationDistance) => {
  if (a.kilometers !== b.kilometers) {
    return a.kilometers - b.kilometers;
  }

  if (a.station.icao === b.station.icao) {
    return 0;
  }

  return a.station.icao < b.station.icao ? -1 : 1;
};

const buildSnapshot = (stations: Station[], source: string, loadedAt: Date): StationSnapshot => {
  if (stations.length === 0) {
    throw new Error('Station list is empty');
  }

  const byIcao = new Map<string, Station>();
  const byIata = new Map<string, Station>();

  for (const input of stations) {
    const icao = input.icao.trim().toUpperCase();

    if (!/^[A-Z0-9]{4}$/.test(icao)) {
      throw new Error(`Station identifier "${input.icao}" must be four alphanumeric characters`);
    }

    if (!isValidLatitude(input.latitude) || !isValidLongitude(input.longitude)) {
      throw new Error(`Station ${icao} has an invalid coordinate`);
    }

    if (byIcao.has(icao)) {
      throw new Error(`Duplicate station identifier ${icao}`);
    }

    const station: Station = Object.freeze({
      ...input,
      icao,
      iata: input.iata ? input.iata.trim().toUpperCase() : null,
    });

    byIcao.set(icao, station);

    if (station.iata && !byIata.has(station.iata)) {
      byIata.set(station.iata, station);
    }
  }

  const sorted = Array.from(byIcao.values()).sort((a, b) => (a.icao < b.icao ? -1 : 1));

  return {
    stations: Object.freeze(sorted),
    byIcao,
    byIata,
    loadedAt,
    source,
  };
};

/**
 * In-memory station lookup. Every load builds a fresh immutable snapshot and
 * swaps the reference; a lookup reads the reference once, so it never sees a
 * half-applied refresh.
 */
export class StationIndex {
  private snapshot: StationSnapshot | null = null;

  load(stations: Station[], source = 'inline', loadedAt = new Date()): number {
    const next = buildSnapshot(stations, source, loadedAt);
    this.snapshot = next;
    return next.stations.length;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  status(): StationIndexStatus {
    const current = this.snapshot;

    return {
      loaded: current !== null,
      count: current?.stations.length ?? 0,
      loadedAt: current ? current.loadedAt.toISOString() : null,
      source: current?.source ?? null,
    };
  }

  resolve(location: LocationQuery): Station {
    return location.kind === 'code'
      ? this.resolveByCode(location.code)
      : this.resolveByCoordinate(location.coordinate.latitude, location.coordinate.longitude);
  }

  resolveByCode(code: string): Station {
    const snapshot = this.requireSnapshot();
    const normalized = normalizeStationCode(code);

    const station =
      normalized.length === 4 ? snapshot.byIcao.get(normalized) : snapshot.byIata.get(normalized);

    if (!station) {
      throw new ReportServiceError('NotFound', `Station ${normalized} was not found`, {
        details: { station: normalized },
      });
    }

    return station;
  }

  resolveByCoordinate(latitude: number, longitude: number): Station {
    const [nearest] = this.nearest(latitude, longitude, 1);
    return nearest.station;
  }

  nearest(
    latitude: number,
    longitude: number,
    count: number,
    options: NearestOptions = {},
  ): StationDistance[] {
    if (!isValidLatitude(latitude) || !isValidLongitude(longitude)) {
      throw new ReportServiceError(
        'InvalidInput',
        `(${latitude}, ${longitude}) is outside the valid latitude/longitude range`,
        { details: { latitude, longitude } },
      );
    }

    const snapshot = this.requireSnapshot();
    const origin: Coordinate = { latitude, longitude };
    const candidates = options.reportingOnly
      ? snapshot.stations.filter((station) => station.reporting)
      : snapshot.stations;

    const ranked = candidates.map((station) => {
      const kilometers = haversineKm(origin, station);
      return { station, kilometers, nauticalMiles: kmToNauticalMiles(kilometers) };
    });

    ranked.sort(compareByDistance);

    return ranked.slice(0, Math.max(1, count));
  }

  private requireSnapshot(): StationSnapshot {
    const current = this.snapshot;

    if (!current) {
      throw new ReportServiceError('ServiceUnavailable', 'Station index has not been loaded yet');
    }

    return current;
  }
}
