import { createApp } from './app';
import { getConfig } from './config';
import { createAccountStore, createMaintenanceTasks, createServices } from './services/container';
import { TaskScheduler } from './services/taskScheduler';
import { flushTelemetryClient, initializeTelemetry } from './telemetry/appInsights';

const main = async () => {
  const config = getConfig();
  const telemetryClient = initializeTelemetry(config);
  const accountStore = await createAccountStore(config);

  const services = createServices(config, {
    accountStore,
    telemetry: telemetryClient,
  });

  // eslint-disable-next-line no-console
  console.log(`[Startup] Using ${accountStore.name} account store, ${services.ledger.policy} quota windows`);

  try {
    await services.stationRefresh.refresh('startup');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('[Startup] Initial station load failed; report requests will fail until a refresh succeeds', error);
  }

  const scheduler = new TaskScheduler({ tasks: createMaintenanceTasks(services) });
  scheduler.start();

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`Server listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    // eslint-disable-next-line no-console
    console.log(`[Shutdown] Received ${signal}, closing server`);
    scheduler.stop();

    server.close(() => {
      void flushTelemetryClient(telemetryClient).then(() => process.exit(0));
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('[Startup] Failed to start server', error);
  process.exit(1);
});
