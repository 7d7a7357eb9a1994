/**
 * rateLimit.ts — Request rate limiting middleware.
 *
 * Two limiters are exported:
 *
 *   1. generalLimiter — Applied globally to all routes.
 *      100 requests/minute per IP.
 *
 *   2. statusPollLimiter — Applied to the status endpoint.
 *      60 requests/minute per authenticated user (falls back to IP). The
 *      waiting screen polls every 3 s, so one open tab uses a third of it.
 *
 * Both return standard RateLimit headers and hand the 429 to the error
 * handler so the body has the usual `{ error, code }` shape.
 */
import rateLimit from 'express-rate-limit';
import type { Request } from 'express';
import { LIMITS } from '../shared';
import { RateLimitError } from '../utils/errors';
import { logger } from '../utils/logger';

/** Global rate limiter: 100 requests per minute per IP across all routes */
export const generalLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: LIMITS.GENERAL_RATE_LIMIT,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, _res, next) => {
    logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
    next(new RateLimitError('Too many requests, please try again later.'));
  },
});

/** Status poll limiter: 60 requests per minute per user */
export const statusPollLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: LIMITS.STATUS_POLL_RATE_LIMIT,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => (req.user ? `user:${req.user.userId}` : `ip:${req.ip ?? 'unknown'}`),
  validate: { xForwardedForHeader: false },
  handler: (req, _res, next) => {
    logger.warn('Status poll rate limit exceeded', { userId: req.user?.userId ?? null });
    next(new RateLimitError('Polling too fast, slow down.', 'STATUS_RATE_LIMIT_EXCEEDED'));
  },
});
