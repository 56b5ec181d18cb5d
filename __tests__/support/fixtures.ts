import { buildConfig, type AppConfig } from '../../src/config/schema';
import type { Clock } from '../../src/lib/clock';
import { silentLogger } from '../../src/lib/logger';
import { InMemoryAccountStore } from '../../src/quota/accountStore';
import type { Account } from '../../src/quota/types';
import { createServices, type ServiceOverrides, type Services } from '../../src/services/container';
import { StationIndex } from '../../src/stations/stationIndex';
import type { Station } from '../../src/stations/types';
import type { RawReport, RawReportSource, ReportType } from '../../src/upstream/types';

export const station = (overrides: Partial<Station> & Pick<Station, 'icao' | 'latitude' | 'longitude'>): Station => ({
  iata: null,
  name: null,
  city: null,
  country: null,
  elevationFt: null,
  type: null,
  reporting: true,
  ...overrides,
});

export const TEST_STATIONS: Station[] = [
  station({ icao: 'KJFK', iata: 'JFK', name: 'John F Kennedy International Airport', city: 'New York', country: 'US', latitude: 40.6398, longitude: -73.7789, elevationFt: 13 }),
  station({ icao: 'KLGA', iata: 'LGA', name: 'LaGuardia Airport', city: 'New York', country: 'US', latitude: 40.7772, longitude: -73.8726, elevationFt: 21 }),
  station({ icao: 'KEWR', iata: 'EWR', name: 'Newark Liberty International Airport', city: 'Newark', country: 'US', latitude: 40.6925, longitude: -74.1687, elevationFt: 18 }),
  station({ icao: 'KJRB', iata: 'JRB', name: 'Downtown Manhattan Heliport', city: 'New York', country: 'US', latitude: 40.7012, longitude: -74.009, reporting: false }),
  station({ icao: 'EGLL', iata: 'LHR', name: 'London Heathrow Airport', city: 'London', country: 'GB', latitude: 51.4706, longitude: -0.4619 }),
];

export const loadedIndex = (stations: Station[] = TEST_STATIONS): StationIndex => {
  const index = new StationIndex();
  index.load(stations, 'test', new Date('2024-05-01T00:00:00.000Z'));
  return index;
};

export const TEST_TOKEN = 'test-token';

export const testAccount = (overrides: Partial<Account> = {}): Account => ({
  token: TEST_TOKEN,
  active: true,
  plan: { name: 'free', type: 'free', limit: 100 },
  ...overrides,
});

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  buildConfig({ NODE_ENV: 'test', ...env });

/** Manually advanced clock, starting at 2024-05-14T12:00:00Z. */
export const createFakeClock = (start = Date.UTC(2024, 4, 14, 12, 0, 0)) => {
  let now = start;
  const clock: Clock = () => now;

  return {
    clock,
    advance: (ms: number) => {
      now += ms;
    },
    set: (value: number) => {
      now = value;
    },
  };
};

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
};

export const METAR_KJFK = 'KJFK 141151Z 21012KT 10SM FEW250 24/14 A3002 RMK AO2 SLP166';
export const TAF_KJFK = 'TAF KJFK 141120Z 1412/1518 21012KT P6SM FEW250\n  FM141800 22015G22KT P6SM SCT050';

/** Raw report source answering from a fixed map of `type:ICAO` texts. */
export class StaticReportSource implements RawReportSource {
  readonly name = 'test-source';
  readonly fetchRaw: jest.Mock<Promise<RawReport | null>, [ReportType, Station]>;

  constructor(reports: Record<string, string> = { 'metar:KJFK': METAR_KJFK, 'taf:KJFK': TAF_KJFK }) {
    this.fetchRaw = jest.fn(async (reportType: ReportType, target: Station): Promise<RawReport | null> => {
      const text = reports[`${reportType}:${target.icao}`];
      return text ? { text, publishedAt: '2024/05/14 11:51', source: this.name } : null;
    });
  }
}

export const createTestServices = (
  options: {
    env?: Record<string, string>;
    accounts?: Account[];
    stationList?: Station[];
  } & ServiceOverrides = {},
): Services => {
  const { env, accounts, stationList, ...overrides } = options;

  return createServices(testConfig(env), {
    logger: silentLogger,
    stations: loadedIndex(stationList),
    accountStore: new InMemoryAccountStore(accounts ?? [testAccount()]),
    reportSource: new StaticReportSource(),
    ...overrides,
  });
};
