import type { Request, Response } from 'express';
import { z } from 'zod';

import type { QuotaWindow } from '../../quota/types';
import { REPORT_TYPES } from '../../upstream/types';
import { RESPONSE_FORMATS, type ResponseFormat } from '../../services/reportRenderer';

const firstValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value[0];
  }

  return value;
};

export const stringParam = (min: number, max: number) =>
  z.preprocess((value) => {
    const first = firstValue(value);
    if (typeof first !== 'string') {
      return first;
    }

    return first.trim();
  }, z.string().min(min).max(max));

export const numericParam = (min: number, max: number) =>
  z.preprocess((value) => {
    const first = firstValue(value);
    if (first === undefined || first === null || first === '') {
      return undefined;
    }

    return first;
  }, z.coerce.number().int().min(min).max(max));

export const booleanParam = z.preprocess((value) => {
  const first = firstValue(value);
  if (first === undefined || first === null) {
    return undefined;
  }

  if (typeof first === 'string') {
    const normalized = first.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) {
      return true;
    }

    if (['false', '0', 'no'].includes(normalized)) {
      return false;
    }
  }

  return first;
}, z.boolean());

export const reportTypeParam = z.preprocess((value) => {
  const first = firstValue(value);
  return typeof first === 'string' ? first.trim().toLowerCase() : first;
}, z.enum(REPORT_TYPES));

export const formatParam = z.preprocess((value) => {
  const first = firstValue(value);
  return typeof first === 'string' ? first.trim().toLowerCase() : first;
}, z.enum(RESPONSE_FORMATS));

export const reportQuerySchema = z.object({
  options: stringParam(0, 100).optional(),
  format: formatParam.optional(),
  token: stringParam(1, 200).optional(),
});

export const setRateLimitHeaders = (res: Response, window: QuotaWindow) => {
  if (window.limit !== null) {
    res.set('X-RateLimit-Limit', String(window.limit));
    res.set('X-RateLimit-Remaining', String(window.remaining ?? 0));
  }

  res.set('X-RateLimit-Reset', String(Math.ceil(window.resetAt / 1000)));
};

export const pickFormat = (req: Request, requested: ResponseFormat | undefined): ResponseFormat => {
  if (requested) {
    return requested;
  }

  return req.accepts(['application/json', 'text/plain']) === 'text/plain' ? 'text' : 'json';
};

/** Aborts only this request's waits when its client goes away. */
export const abortOnClientClose = (res: Response) => {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    release: () => {
      res.off('close', onClose);
    },
  };
};
