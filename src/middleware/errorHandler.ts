import type { NextFunction, Request, Response } from 'express';

import { HttpError, ReportServiceError } from '../lib/errors';

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new ReportServiceError('NotFound', `No route matches ${req.method} ${req.path}`));
};

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
};

// express.json and express.text reject unreadable bodies with a 4xx `status`
// and a `type` such as entity.parse.failed.
const isBodyParserError = (err: unknown): err is Error & { type: string; status: number } =>
  err instanceof Error &&
  'type' in err &&
  typeof err.type === 'string' &&
  'status' in err &&
  typeof err.status === 'number' &&
  err.status >= 400 &&
  err.status < 500;

const toHttpError = (err: unknown): HttpError | null => {
  if (err instanceof HttpError) {
    return err;
  }

  if (isBodyParserError(err)) {
    return new ReportServiceError(
      'InvalidInput',
      BODY_ERROR_MESSAGES[err.type] ?? 'Request body could not be read',
      { details: { type: err.type } },
    );
  }

  return null;
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const httpError = toHttpError(err);
  const status = httpError ? httpError.statusCode : 500;
  const message = httpError ? httpError.message : 'Internal Server Error';

  const payload = {
    error: httpError ? httpError.kind : 'InternalError',
    message,
    ...(httpError && httpError.details !== undefined ? { details: httpError.details } : {}),
  };

  if (err instanceof ReportServiceError && err.retryAfterMs !== undefined) {
    res.set('Retry-After', String(Math.max(1, Math.ceil(err.retryAfterMs / 1000))));
  }

  if (status >= 500) {
    // eslint-disable-next-line no-console
    console.error(err);
  }

  res.status(status).json(payload);
};
