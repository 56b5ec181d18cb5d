import express from 'express';
import helmet from 'helmet';

import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { loggingMiddleware } from './middleware/logging';
import { createMultiRouter } from './routes/api/multi';
import { createParseRouter } from './routes/api/parse';
import { createReportsRouter } from './routes/api/reports';
import { createStationsRouter } from './routes/api/stations';
import { createHealthRouter } from './routes/health';
import type { Services } from './services/container';

export const createApp = (services: Services) => {
  const app = express();

  app.set('trust proxy', services.config.nodeEnv === 'production');

  app.use(helmet());
  app.use(express.json());
  app.use(express.text({ type: 'text/plain', limit: '16kb' }));
  app.use(loggingMiddleware);

  app.use('/health', createHealthRouter(services));
  app.use('/api/station', createStationsRouter(services));
  app.use('/api/parse', createParseRouter(services));
  app.use('/api/multi', createMultiRouter(services));
  app.use('/api', createReportsRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
