import { createServer, type Server } from 'http';

import { MockAgent } from 'undici';

import { silentLogger } from '../src/lib/logger';
import { NoaaReportSource, parseStationProduct } from '../src/upstream/noaaReportSource';
import { RawTextEngine } from '../src/upstream/rawTextEngine';
import { UpstreamFetcher } from '../src/upstream/reportFetcher';
import { SourceUnavailableError } from '../src/upstream/types';
import { TEST_STATIONS } from './support/fixtures';

const BASE_URL = 'https://reports.example.com';
const [KJFK] = TEST_STATIONS;

describe('parseStationProduct', () => {
  it('separates the timestamp header from a METAR body', () => {
    expect(parseStationProduct('metar', '2024/05/14 11:51\nKJFK 141151Z 21012KT\n')).toEqual({
      publishedAt: '2024/05/14 11:51',
      text: 'KJFK 141151Z 21012KT',
    });
  });

  it('keeps TAF line breaks', () => {
    expect(
      parseStationProduct('taf', '2024/05/14 11:20\r\nTAF KJFK 141120Z 1412/1518 21012KT\r\n     FM141800 22015KT\r\n'),
    ).toEqual({
      publishedAt: '2024/05/14 11:20',
      text: 'TAF KJFK 141120Z 1412/1518 21012KT\nFM141800 22015KT',
    });
  });

  it('returns null for an empty product', () => {
    expect(parseStationProduct('metar', '\n\n')).toBeNull();
    expect(parseStationProduct('metar', '2024/05/14 11:51\n')).toBeNull();
  });
});

describe('NoaaReportSource', () => {
  let agent: MockAgent;
  let source: NoaaReportSource;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    source = new NoaaReportSource({ baseUrl: `${BASE_URL}/`, timeoutMs: 1_000, dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('builds station product URLs per report type', () => {
    expect(source.urlFor('metar', KJFK)).toBe(`${BASE_URL}/observations/metar/stations/KJFK.TXT`);
    expect(source.urlFor('taf', KJFK)).toBe(`${BASE_URL}/forecasts/taf/stations/KJFK.TXT`);
  });

  it('returns the report text', async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: '/observations/metar/stations/KJFK.TXT', method: 'GET' })
      .reply(200, '2024/05/14 11:51\nKJFK 141151Z 21012KT 10SM FEW250 24/14 A3002\n');

    await expect(source.fetchRaw('metar', KJFK)).resolves.toEqual({
      text: 'KJFK 141151Z 21012KT 10SM FEW250 24/14 A3002',
      publishedAt: '2024/05/14 11:51',
      source: 'NOAA',
    });
  });

  it('treats a missing product as no report', async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: '/forecasts/taf/stations/KJFK.TXT', method: 'GET' })
      .reply(404, 'Not Found');

    await expect(source.fetchRaw('taf', KJFK)).resolves.toBeNull();
  });

  it('reports server errors as an unavailable source', async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: '/observations/metar/stations/KJFK.TXT', method: 'GET' })
      .reply(502, 'Bad Gateway');

    const failure = source.fetchRaw('metar', KJFK);

    await expect(failure).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(failure).rejects.toMatchObject({
      source: 'NOAA',
      message: 'Report source returned 502 for KJFK',
    });
  });

  it('reports connection failures as an unavailable source', async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: '/observations/metar/stations/KJFK.TXT', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await expect(source.fetchRaw('metar', KJFK)).rejects.toThrow('Report source could not be reached');
  });
});

describe('NoaaReportSource with a slow report body', () => {
  let server: Server;
  let baseUrl: string;
  let afterHeaders: (socket: { destroy: () => void }) => void;

  beforeEach(async () => {
    afterHeaders = () => undefined;
    server = createServer((_req, res) => {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.write('2024/05/14 11:51\n');
      afterHeaders(res.socket ?? { destroy: () => undefined });
    });

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it('times out a body that stops arriving', async () => {
    const source = new NoaaReportSource({ baseUrl, timeoutMs: 200 });

    const failure = source.fetchRaw('metar', KJFK);

    await expect(failure).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(failure).rejects.toThrow('Report source timed out after 200ms');
  });

  it('reports a connection dropped mid-body as unreachable', async () => {
    afterHeaders = (socket) => {
      setTimeout(() => socket.destroy(), 20);
    };
    const source = new NoaaReportSource({ baseUrl, timeoutMs: 5_000 });

    await expect(source.fetchRaw('metar', KJFK)).rejects.toThrow('Report source could not be reached');
  });

  it('surfaces a stalled body as service unavailable', async () => {
    const fetcher = new UpstreamFetcher({
      source: new NoaaReportSource({ baseUrl, timeoutMs: 200 }),
      engine: new RawTextEngine(),
      logger: silentLogger,
    });

    await expect(fetcher.fetch('metar', KJFK, [])).rejects.toMatchObject({
      kind: 'ServiceUnavailable',
      statusCode: 503,
      message: 'Unable to fetch METAR from NOAA',
    });
  });
});
