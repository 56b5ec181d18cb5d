import { createMaintenanceTasks } from '../src/services/container';
import type { StationSource } from '../src/stations/types';
import {
  TEST_STATIONS,
  TEST_TOKEN,
  createFakeClock,
  createTestServices,
  deferred,
} from './support/fixtures';

const createLogger = () => ({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

const taskNamed = (tasks: ReturnType<typeof createMaintenanceTasks>, name: string) => {
  const found = tasks.find((task) => task.name === name);
  if (!found) {
    throw new Error(`No ${name} task was created`);
  }

  return found;
};

describe('createMaintenanceTasks', () => {
  it('sweeps the cache and prunes quotas by default', () => {
    const logger = createLogger();
    const tasks = createMaintenanceTasks(createTestServices(), logger);

    expect(tasks.map((task) => [task.name, task.intervalMs])).toEqual([
      ['report-cache-sweep', 300_000],
      ['quota-prune', 300_000],
    ]);
    expect(logger.info).toHaveBeenCalledWith('[Scheduler] Station refresh disabled via configuration');
  });

  it('adds the station refresh when enabled', () => {
    const services = createTestServices({
      env: {
        STATION_REFRESH_ENABLED: 'true',
        STATION_REFRESH_INTERVAL_MINUTES: '30',
        REPORT_CACHE_SWEEP_SECONDS: '0',
      },
    });

    const tasks = createMaintenanceTasks(services, createLogger());

    expect(tasks.map((task) => [task.name, task.intervalMs])).toEqual([['station-refresh', 1_800_000]]);
  });

  it('reloads the station index', async () => {
    const stationSource: StationSource = {
      description: 'test stations',
      listAllStations: jest.fn().mockResolvedValue(TEST_STATIONS),
    };
    const services = createTestServices({ env: { STATION_REFRESH_ENABLED: 'true' }, stationSource });

    const summary = await taskNamed(createMaintenanceTasks(services, createLogger()), 'station-refresh').run();

    expect(summary).toBe('loaded 5 stations from test stations');
  });

  it('skips the station refresh while another one runs', async () => {
    const pending = deferred<typeof TEST_STATIONS>();
    const stationSource: StationSource = {
      description: 'test stations',
      listAllStations: jest.fn(() => pending.promise),
    };
    const services = createTestServices({ env: { STATION_REFRESH_ENABLED: 'true' }, stationSource });
    const logger = createLogger();
    const manual = services.stationRefresh.refresh('manual');

    const summary = await taskNamed(createMaintenanceTasks(services, logger), 'station-refresh').run();

    expect(summary).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      '[Scheduler] Station refresh already in progress, skipping scheduled run',
    );

    pending.resolve(TEST_STATIONS);
    await manual;
  });

  it('reclaims expired reports and idle accounts', async () => {
    const { clock, advance } = createFakeClock();
    const services = createTestServices({ clock });
    await services.dispatcher.dispatch({ reportType: 'metar', identifier: 'KJFK', token: TEST_TOKEN });
    const tasks = createMaintenanceTasks(services, createLogger());

    advance(121_000);

    expect(taskNamed(tasks, 'report-cache-sweep').run()).toBe('removed 1 expired reports');
    expect(taskNamed(tasks, 'quota-prune').run()).toBe('pruned 1 idle quota records');
    expect(services.reportCache.stats().size).toBe(0);
  });
});
