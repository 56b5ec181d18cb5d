import type { TelemetryClient } from 'applicationinsights';

import { toError } from '../lib/errors';
import type { RefreshTrigger } from './stationRefreshService';

export const createRefreshTelemetryHooks = (client: TelemetryClient) => ({
  onSuccess: ({
    durationMs,
    stations,
    trigger,
  }: {
    durationMs: number;
    stations: number;
    trigger: RefreshTrigger;
  }) => {
    client.trackMetric({
      name: 'StationRefreshDurationMs',
      value: durationMs,
      properties: {
        trigger,
      },
    });

    client.trackEvent({
      name: 'StationRefreshCompleted',
      properties: {
        trigger,
      },
      measurements: {
        durationMs,
        stations,
      },
    });
  },
  onFailure: ({
    durationMs,
    error,
    trigger,
  }: {
    durationMs: number;
    error: unknown;
    trigger: RefreshTrigger;
  }) => {
    client.trackEvent({
      name: 'StationRefreshFailed',
      properties: {
        trigger,
      },
      measurements: {
        durationMs,
      },
    });

    client.trackException({
      exception: toError(error),
      properties: {
        trigger,
      },
    });
  },
});
