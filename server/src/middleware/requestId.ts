/**
 * requestId.ts — Request tracing middleware.
 *
 * Reuses an inbound `x-request-id` (load balancer / gateway) or generates a
 * UUID, echoes it back in the response header, and runs the rest of the
 * request inside the logger's request context.
 */
import { v4 as uuid } from 'uuid';
import type { Request, Response, NextFunction } from 'express';
import { runWithRequestId } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

const MAX_INBOUND_ID_LENGTH = 128;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.headers['x-request-id'];
  const requestId =
    typeof inbound === 'string' && inbound.length > 0 && inbound.length <= MAX_INBOUND_ID_LENGTH
      ? inbound
      : uuid();

  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  runWithRequestId(requestId, next);
}
