import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { clientIdFor, extractToken } from '../../middleware/auth';
import { validateRequest } from '../../middleware/validation';
import type { Services } from '../../services/container';
import { renderJson, renderText } from '../../services/reportRenderer';
import {
  abortOnClientClose,
  pickFormat,
  reportQuerySchema,
  reportTypeParam,
  setRateLimitHeaders,
} from './params';

const reportRequestSchema = z.object({
  params: z.object({
    reportType: reportTypeParam,
    identifier: z.string().min(1).optional(),
    coordinate: z.string().min(1).optional(),
  }),
  query: reportQuerySchema,
  body: z.unknown().optional(),
});

export const createReportsRouter = (services: Services) => {
  const router = Router();

  const handleReport = async (req: Request, res: Response, next: NextFunction) => {
    const { signal, release } = abortOnClientClose(res);

    try {
      const { params, query } = reportRequestSchema.parse({
        params: req.params,
        query: req.query,
        body: req.body,
      });

      const identifier = params.coordinate ? `coord/${params.coordinate}` : params.identifier ?? '';

      const result = await services.dispatcher.dispatch({
        reportType: params.reportType,
        identifier,
        options: query.options,
        token: extractToken(req),
        clientId: clientIdFor(req),
        signal,
      });

      setRateLimitHeaders(res, result.window);
      res.set('X-Cache', result.cacheHit ? 'HIT' : 'MISS');

      if (pickFormat(req, query.format) === 'text') {
        res.type('text/plain').send(renderText(result));
        return;
      }

      res.json(renderJson(result, services.clock(), services.stations.status()));
    } catch (error) {
      next(error);
    } finally {
      release();
    }
  };

  router.get('/:reportType/coord/:coordinate', validateRequest(reportRequestSchema), handleReport);
  router.get('/:reportType/:identifier', validateRequest(reportRequestSchema), handleReport);

  return router;
};
