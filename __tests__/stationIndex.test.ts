import { ReportServiceError } from '../src/lib/errors';
import { StationIndex } from '../src/stations/stationIndex';
import { TEST_STATIONS, loadedIndex, station } from './support/fixtures';

const expectKind = (fn: () => unknown, kind: string, message?: string) => {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(ReportServiceError);
  if (caught instanceof ReportServiceError) {
    expect(caught.kind).toBe(kind);
    if (message) {
      expect(caught.message).toBe(message);
    }
  }
};

describe('StationIndex', () => {
  describe('resolveByCode', () => {
    it('finds a station by ICAO code regardless of case', () => {
      const index = loadedIndex();

      expect(index.resolveByCode('KJFK').icao).toBe('KJFK');
      expect(index.resolveByCode('kjfk').icao).toBe('KJFK');
    });

    it('looks up three character codes as IATA', () => {
      const index = loadedIndex();

      expect(index.resolveByCode('lhr').icao).toBe('EGLL');
    });

    it('reports unknown codes as not found', () => {
      const index = loadedIndex();

      expectKind(() => index.resolveByCode('ZZZZ'), 'NotFound', 'Station ZZZZ was not found');
    });

    it('rejects malformed codes as invalid input', () => {
      const index = loadedIndex();

      expectKind(() => index.resolveByCode('K$FK'), 'InvalidInput');
      expectKind(() => index.resolveByCode('TOOLONG'), 'InvalidInput');
    });
  });

  describe('resolveByCoordinate', () => {
    it('returns the closest station', () => {
      const index = loadedIndex();

      expect(index.resolveByCoordinate(40.6413, -73.7781).icao).toBe('KJFK');
      expect(index.resolveByCoordinate(51.5, -0.1).icao).toBe('EGLL');
    });

    it('always returns a station, however far away', () => {
      const index = loadedIndex();

      expect(index.resolveByCoordinate(-89.9, 179.9).icao).toEqual(expect.any(String));
    });

    it('breaks distance ties with the smallest identifier', () => {
      const index = new StationIndex();
      index.load([
        station({ icao: 'ZZZZ', latitude: 0, longitude: 1 }),
        station({ icao: 'AAAA', latitude: 0, longitude: -1 }),
      ]);

      expect(index.resolveByCoordinate(0, 0).icao).toBe('AAAA');
      expect(index.resolveByCoordinate(0, 0).icao).toBe('AAAA');
    });

    it.each([
      [200, 0],
      [-90.5, 0],
      [0, 180.1],
      [Number.NaN, 0],
    ])('rejects (%p, %p) as invalid input', (latitude, longitude) => {
      const index = loadedIndex();

      expectKind(() => index.resolveByCoordinate(latitude, longitude), 'InvalidInput');
    });

    it('accepts the exact range boundaries', () => {
      const index = loadedIndex();

      expect(() => index.resolveByCoordinate(90, 180)).not.toThrow();
      expect(() => index.resolveByCoordinate(-90, -180)).not.toThrow();
    });
  });

  describe('nearest', () => {
    it('ranks stations by distance', () => {
      const index = loadedIndex();

      const result = index.nearest(40.6398, -73.7789, 3);

      expect(result.map((entry) => entry.station.icao)).toEqual(['KJFK', 'KLGA', 'KJRB']);
      expect(result[0].kilometers).toBe(0);
      expect(result[1].nauticalMiles).toBeCloseTo(result[1].kilometers / 1.852, 10);
    });

    it('can skip stations that do not publish reports', () => {
      const index = loadedIndex();

      const result = index.nearest(40.6398, -73.7789, 3, { reportingOnly: true });

      expect(result.map((entry) => entry.station.icao)).toEqual(['KJFK', 'KLGA', 'KEWR']);
    });
  });

  describe('load', () => {
    it('is unavailable until a station list has been loaded', () => {
      const index = new StationIndex();

      expect(index.status()).toEqual({ loaded: false, count: 0, loadedAt: null, source: null });
      expectKind(
        () => index.resolveByCode('KJFK'),
        'ServiceUnavailable',
        'Station index has not been loaded yet',
      );
    });

    it('reports the loaded snapshot', () => {
      const index = loadedIndex();

      expect(index.status()).toEqual({
        loaded: true,
        count: TEST_STATIONS.length,
        loadedAt: '2024-05-01T00:00:00.000Z',
        source: 'test',
      });
    });

    it('keeps the previous snapshot when a new list is rejected', () => {
      const index = loadedIndex();

      expect(() =>
        index.load([
          station({ icao: 'KBOS', latitude: 42.3643, longitude: -71.0052 }),
          station({ icao: 'KBOS', latitude: 42.3643, longitude: -71.0052 }),
        ]),
      ).toThrow('Duplicate station identifier KBOS');
      expect(() => index.load([])).toThrow('Station list is empty');

      expect(index.resolveByCode('KJFK').icao).toBe('KJFK');
      expect(index.status().count).toBe(TEST_STATIONS.length);
    });

    it('replaces the snapshot on a successful load', () => {
      const index = loadedIndex();

      index.load([station({ icao: 'KBOS', latitude: 42.3643, longitude: -71.0052 })], 'refresh');

      expect(index.resolveByCoordinate(40.6398, -73.7789).icao).toBe('KBOS');
      expectKind(() => index.resolveByCode('KJFK'), 'NotFound');
    });
  });
});
