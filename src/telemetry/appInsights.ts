import appInsights, { type TelemetryClient } from 'applicationinsights';

import type { AppConfig } from '../config';

let client: TelemetryClient | null = null;

const DEFAULT_ROLE_NAME = 'wx-report-gateway';

// Request and dependency collection stay on: upstream report fetches go through
// undici, which shows up as outgoing dependencies next to each request.
const configureTelemetry = (connectionString: string) => {
  appInsights
    .setup(connectionString)
    .setAutoDependencyCorrelation(true)
    .setAutoCollectConsole(false, false)
    .setAutoCollectDependencies(true)
    .setAutoCollectExceptions(true)
    .setAutoCollectPerformance(true, false)
    .setAutoCollectRequests(true)
    .setAutoCollectHeartbeat(false)
    .setSendLiveMetrics(false)
    .setUseDiskRetryCaching(false);
};

export const initializeTelemetry = (config: AppConfig): TelemetryClient | null => {
  if (client) {
    return client;
  }

  const settings = config.telemetry.appInsights;
  if (!settings?.connectionString) {
    return null;
  }

  try {
    configureTelemetry(settings.connectionString);

    const defaultClient = appInsights.defaultClient;
    if (!defaultClient) {
      return null;
    }

    if (settings.samplingPercentage !== null) {
      defaultClient.config.samplingPercentage = settings.samplingPercentage;
    }

    const cloudRoleTag = defaultClient.context.keys.cloudRole;
    defaultClient.context.tags[cloudRoleTag] = settings.roleName ?? DEFAULT_ROLE_NAME;

    appInsights.start();
    client = defaultClient;

    return client;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('[Telemetry] Failed to initialize Application Insights', error);
    return null;
  }
};

export const getTelemetryClient = (): TelemetryClient | null => client;

export const flushTelemetryClient = (
  telemetryClient: TelemetryClient | null | undefined,
  timeoutMs = 5000,
): Promise<void> =>
  new Promise((resolve) => {
    if (!telemetryClient) {
      resolve();
      return;
    }

    let resolved = false;

    const done = () => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    telemetryClient.flush({
      callback: done,
    });

    if (timeoutMs > 0) {
      setTimeout(done, timeoutMs).unref?.();
    }
  });
