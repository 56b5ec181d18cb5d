import request from 'supertest';

import { createApp } from '../src/app';
import {
  METAR_KJFK,
  StaticReportSource,
  TEST_TOKEN,
  createFakeClock,
  createTestServices,
  testAccount,
} from './support/fixtures';

const NOW_ISO = '2024-05-14T12:00:00.000Z';
const METAR_KLGA = 'KLGA 141151Z 19008KT 10SM FEW040 24/13 A3001';

const setup = (options: { limit?: number } = {}) => {
  const fakeClock = createFakeClock();
  const source = new StaticReportSource({ 'metar:KJFK': METAR_KJFK, 'metar:KLGA': METAR_KLGA });
  const services = createTestServices({
    clock: fakeClock.clock,
    reportSource: source,
    accounts: [testAccount({ plan: { name: 'free', type: 'free', limit: options.limit ?? 100 } })],
  });

  return { ...fakeClock, source, services, app: createApp(services) };
};

describe('GET /api/multi/:reportType/:stations', () => {
  it('returns one entry per station and charges one request', async () => {
    const { app } = setup();

    const response = await request(app)
      .get('/api/multi/metar/KJFK,KLGA,KJRB')
      .set('Authorization', `Bearer ${TEST_TOKEN}`);

    expect(response.status).toBe(200);
    expect(response.headers['x-ratelimit-remaining']).toBe('99');
    expect(response.body.meta).toEqual({
      timestamp: NOW_ISO,
      cacheTimestamp: null,
      stationsUpdated: '2024-05-01T00:00:00.000Z',
    });
    expect(Object.keys(response.body.data)).toEqual(['KJFK', 'KLGA', 'KJRB']);
    expect(response.body.data.KJFK).toMatchObject({ raw: METAR_KJFK, station: 'KJFK' });
    expect(response.body.data.KLGA).toMatchObject({ raw: METAR_KLGA, station: 'KLGA' });
    expect(response.body.data.KJRB).toEqual({
      error: 'NotFound',
      message: 'No METAR reports were found for KJRB',
    });
  });

  it('adds station info to each report when asked for', async () => {
    const { app } = setup();

    const response = await request(app)
      .get('/api/multi/metar/KJFK')
      .query({ token: TEST_TOKEN, options: 'info' });

    expect(response.status).toBe(200);
    expect(response.body.data.KJFK.info).toMatchObject({ icao: 'KJFK', iata: 'JFK', city: 'New York' });
  });

  it('renders plain text station by station', async () => {
    const { app } = setup();

    const response = await request(app)
      .get('/api/multi/metar/KJFK,KJRB')
      .query({ token: TEST_TOKEN, format: 'text' });

    expect(response.status).toBe(200);
    expect(response.text).toBe(
      [
        'KJFK',
        METAR_KJFK,
        'station: KJFK',
        'type: metar',
        'time: {"repr":"141151Z","dt":"2024-05-14T11:51:00.000Z"}',
        'validity: -',
        'body: 21012KT 10SM FEW250 24/14 A3002',
        'remarks: AO2 SLP166',
        '',
        'KJRB',
        'error: No METAR reports were found for KJRB',
        '',
      ].join('\n'),
    );
  });

  it('rejects more than ten stations', async () => {
    const { app, source } = setup();

    const response = await request(app)
      .get(`/api/multi/metar/${Array.from({ length: 11 }, () => 'KJFK').join(',')}`)
      .query({ token: TEST_TOKEN });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'InvalidInput',
      message: 'Multi requests are limited to 10 stations or less',
      details: { param: 'stations', count: 11 },
    });
    expect(source.fetchRaw).not.toHaveBeenCalled();
  });

  it('rejects the request when any station is unknown', async () => {
    const { app } = setup();

    const response = await request(app).get('/api/multi/metar/KJFK,ZZZZ').query({ token: TEST_TOKEN });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: 'NotFound',
      message: 'Station ZZZZ was not found',
      details: { station: 'ZZZZ' },
    });
  });

  it('applies the rate limit once per request', async () => {
    const { app } = setup({ limit: 1 });

    const first = await request(app).get('/api/multi/metar/KJFK,KLGA').query({ token: TEST_TOKEN });
    const second = await request(app).get('/api/multi/metar/KJFK,KLGA').query({ token: TEST_TOKEN });

    expect(first.status).toBe(200);
    expect(first.headers['x-ratelimit-remaining']).toBe('0');
    expect(second.status).toBe(429);
    expect(second.body.error).toBe('RateLimited');
  });
});

describe('GET /api/multi/station/:stations', () => {
  it('returns station info keyed by ICAO code without charging quota', async () => {
    const { app, services } = setup({ limit: 1 });

    const response = await request(app).get('/api/multi/station/JFK,klga');

    expect(response.status).toBe(200);
    expect(Object.keys(response.body.data)).toEqual(['KJFK', 'KLGA']);
    expect(response.body.data.KLGA).toMatchObject({ icao: 'KLGA', name: 'LaGuardia Airport' });

    const admitted = await services.ledger.checkAndIncrement(TEST_TOKEN);
    expect(admitted.admitted).toBe(true);
  });

  it('reports unknown stations as not found', async () => {
    const { app } = setup();

    const response = await request(app).get('/api/multi/station/KJFK,KZZZ');

    expect(response.status).toBe(404);
    expect(response.body.message).toBe('Station KZZZ was not found');
  });
});
