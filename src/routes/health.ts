import type { Request, Response } from 'express';
import { Router } from 'express';

import type { Services } from '../services/container';

export const createHealthRouter = (services: Services) => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const stations = services.stations.status();
    const cache = services.reportCache.stats();

    res.json({
      status: stations.loaded ? 'ok' : 'starting',
      stations,
      cache: {
        size: cache.size,
        inFlight: cache.inFlight,
        hits: cache.hits,
        misses: cache.misses,
      },
    });
  });

  return router;
};
