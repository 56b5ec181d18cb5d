import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { clientIdFor, extractToken } from '../../middleware/auth';
import { validateRequest } from '../../middleware/validation';
import type { Services } from '../../services/container';
import { renderJson, renderText } from '../../services/reportRenderer';
import { reportQuerySchema, reportTypeParam, setRateLimitHeaders } from './params';

const parseRequestSchema = z.object({
  params: z.object({
    reportType: reportTypeParam,
  }),
  query: reportQuerySchema,
  body: z.string({
    required_error: 'Send the raw report as a text/plain body',
    invalid_type_error: 'Send the raw report as a text/plain body',
  }),
});

export const createParseRouter = (services: Services) => {
  const router = Router();

  router.post(
    '/:reportType',
    validateRequest(parseRequestSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { params, query, body } = parseRequestSchema.parse({
          params: req.params,
          query: req.query,
          body: req.body,
        });

        const result = await services.dispatcher.parse({
          reportType: params.reportType,
          rawText: body,
          options: query.options,
          token: extractToken(req),
          clientId: clientIdFor(req),
        });

        setRateLimitHeaders(res, result.window);

        if (query.format === 'text') {
          res.type('text/plain').send(renderText(result));
          return;
        }

        res.json(renderJson(result, services.clock(), services.stations.status()));
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
};
