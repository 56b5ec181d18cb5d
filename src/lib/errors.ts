export type ReportErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'Unauthorized'
  | 'RateLimited'
  | 'ServiceUnavailable'
  | 'UpstreamParseError'
  | 'InternalError';

export const STATUS_BY_KIND: Record<ReportErrorKind, number> = {
  InvalidInput: 400,
  Unauthorized: 401,
  NotFound: 404,
  RateLimited: 429,
  ServiceUnavailable: 503,
  UpstreamParseError: 503,
  InternalError: 500,
};

const KIND_BY_STATUS: Record<number, ReportErrorKind> = {
  400: 'InvalidInput',
  401: 'Unauthorized',
  404: 'NotFound',
  429: 'RateLimited',
  503: 'ServiceUnavailable',
};

export class HttpError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }

  get kind(): ReportErrorKind {
    return KIND_BY_STATUS[this.statusCode] ?? 'InternalError';
  }
}

type ReportServiceErrorOptions = {
  details?: unknown;
  retryAfterMs?: number;
  cause?: unknown;
};

/**
 * Failure carrying one of the gateway's error kinds. The HTTP status is derived
 * from the kind, so core modules never pick status codes themselves.
 */
export class ReportServiceError extends HttpError {
  readonly errorKind: ReportErrorKind;
  readonly retryAfterMs?: number;

  constructor(kind: ReportErrorKind, message: string, options: ReportServiceErrorOptions = {}) {
    super(message, STATUS_BY_KIND[kind], options.details);
    this.name = 'ReportServiceError';
    this.errorKind = kind;
    this.retryAfterMs = options.retryAfterMs;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  override get kind(): ReportErrorKind {
    return this.errorKind;
  }
}

export const toError = (error: unknown): Error => {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  try {
    const serialized = JSON.stringify(error);
    return new Error(serialized ?? 'Unknown error');
  } catch {
    return new Error(String(error));
  }
};
