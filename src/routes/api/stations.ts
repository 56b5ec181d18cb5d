import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { validateRequest } from '../../middleware/validation';
import type { Services } from '../../services/container';
import { buildMeta, toStationInfo } from '../../services/reportRenderer';
import { parseCoordinate, parseLocation } from '../../stations/location';
import { booleanParam, numericParam } from './params';

const stationRequestSchema = z.object({
  params: z.object({
    identifier: z.string().min(1).optional(),
    coordinate: z.string().min(1).optional(),
  }),
  query: z.unknown().optional(),
  body: z.unknown().optional(),
});

const nearRequestSchema = z.object({
  params: z.object({
    coordinate: z.string().min(1),
  }),
  query: z.object({
    n: numericParam(1, 200).optional(),
    reporting: booleanParam.optional(),
  }),
  body: z.unknown().optional(),
});

const round = (value: number, digits: number) => Number(value.toFixed(digits));

// Station lookups are metadata only: no quota and no upstream calls.
export const createStationsRouter = (services: Services) => {
  const router = Router();

  router.get(
    '/near/:coordinate',
    validateRequest(nearRequestSchema),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const { params, query } = nearRequestSchema.parse({
          params: req.params,
          query: req.query,
          body: req.body,
        });

        const { latitude, longitude } = parseCoordinate(params.coordinate);
        const nearest = services.stations.nearest(latitude, longitude, query.n ?? 10, {
          reportingOnly: query.reporting ?? true,
        });

        res.json({
          meta: buildMeta(services.clock(), null, services.stations.status()),
          data: nearest.map((entry) => ({
            station: toStationInfo(entry.station),
            kilometers: round(entry.kilometers, 3),
            nauticalMiles: round(entry.nauticalMiles, 3),
          })),
        });
      } catch (error) {
        next(error);
      }
    },
  );

  const handleStation = (req: Request, res: Response, next: NextFunction) => {
    try {
      const { params } = stationRequestSchema.parse({
        params: req.params,
        query: req.query,
        body: req.body,
      });

      const identifier = params.coordinate ? `coord/${params.coordinate}` : params.identifier ?? '';
      const station = services.stations.resolve(parseLocation(identifier));

      res.json({
        meta: buildMeta(services.clock(), null, services.stations.status()),
        ...toStationInfo(station),
      });
    } catch (error) {
      next(error);
    }
  };

  router.get('/coord/:coordinate', validateRequest(stationRequestSchema), handleStation);
  router.get('/:identifier', validateRequest(stationRequestSchema), handleStation);

  return router;
};
