import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { clientIdFor, extractToken } from '../../middleware/auth';
import { validateRequest } from '../../middleware/validation';
import type { Services } from '../../services/container';
import {
  buildMeta,
  renderMultiJson,
  renderMultiText,
  toStationInfo,
  type StationInfo,
} from '../../services/reportRenderer';
import { parseStationList } from '../../stations/location';
import {
  abortOnClientClose,
  pickFormat,
  reportQuerySchema,
  reportTypeParam,
  setRateLimitHeaders,
} from './params';

const multiStationSchema = z.object({
  params: z.object({
    stations: z.string().min(1),
  }),
  query: z.unknown().optional(),
  body: z.unknown().optional(),
});

const multiReportSchema = z.object({
  params: z.object({
    reportType: reportTypeParam,
    stations: z.string().min(1),
  }),
  query: reportQuerySchema,
  body: z.unknown().optional(),
});

export const createMultiRouter = (services: Services) => {
  const router = Router();

  router.get(
    '/station/:stations',
    validateRequest(multiStationSchema),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const { params } = multiStationSchema.parse({
          params: req.params,
          query: req.query,
          body: req.body,
        });

        const data: Record<string, StationInfo> = {};
        for (const code of parseStationList(params.stations)) {
          const station = services.stations.resolveByCode(code);
          data[station.icao] = toStationInfo(station);
        }

        res.json({
          meta: buildMeta(services.clock(), null, services.stations.status()),
          data,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  router.get(
    '/:reportType/:stations',
    validateRequest(multiReportSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      const { signal, release } = abortOnClientClose(res);

      try {
        const { params, query } = multiReportSchema.parse({
          params: req.params,
          query: req.query,
          body: req.body,
        });

        const result = await services.dispatcher.dispatchMany({
          reportType: params.reportType,
          stations: params.stations,
          options: query.options,
          token: extractToken(req),
          clientId: clientIdFor(req),
          signal,
        });

        setRateLimitHeaders(res, result.window);

        if (pickFormat(req, query.format) === 'text') {
          res.type('text/plain').send(renderMultiText(result));
          return;
        }

        res.json(renderMultiJson(result, services.clock(), services.stations.status()));
      } catch (error) {
        next(error);
      } finally {
        release();
      }
    },
  );

  return router;
};
