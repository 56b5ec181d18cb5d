import type { Request } from 'express';

const BEARER_PREFIX = /^bearer\s+/i;

const firstString = (value: unknown): string | undefined => {
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : undefined;
};

/**
 * API token from `Authorization: Bearer <token>`, a bare `Authorization`
 * value, or the `token` query parameter, in that order.
 */
export const extractToken = (req: Request): string | null => {
  const header = req.get('authorization')?.trim();
  if (header) {
    const token = header.replace(BEARER_PREFIX, '').trim();
    if (token) {
      return token;
    }
  }

  const query = firstString(req.query.token)?.trim();
  return query ? query : null;
};

export const clientIdFor = (req: Request): string => req.ip ?? req.socket.remoteAddress ?? 'unknown';
