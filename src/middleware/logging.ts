import morgan from 'morgan';

import { getTelemetryClient } from '../telemetry/appInsights';

const stream = {
  write: (message: string) => {
    process.stdout.write(message);

    const client = getTelemetryClient();
    if (client) {
      client.trackTrace({ message: message.replace(/\n$/, '') });
    }
  },
};

morgan.token('cache', (_req, res) => {
  const value = res.getHeader('x-cache');
  return typeof value === 'string' ? value : '-';
});

export const loggingMiddleware = morgan(
  ':method :url :status :res[content-length] - :response-time ms cache=:cache',
  {
    stream,
    skip: () => process.env.NODE_ENV === 'test',
  },
);
