/**
 * auth.ts — JWT authentication middleware and token utilities.
 *
 * Provides three exports:
 *   - authMiddleware(secret): Express middleware that validates Bearer tokens
 *   - generateToken:          Creates a JWT with userId + role (24-hour expiry)
 *   - verifyToken:            Standalone verification, also used by the
 *                             Socket.IO handshake (socket/index.ts)
 *
 * Tokens are issued by the portal's login service; this server only checks
 * them. The claims it needs are `userId` (string or number) and `role`
 * (doctor | patient | lab | admin). A token without both is treated as
 * no identity at all.
 *
 * The middleware extends Express's Request type to include `req.user`.
 */
import jwt from 'jsonwebtoken';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Identity } from '../shared';
import { UnauthenticatedError, errorMessage } from '../utils/errors';
import { parseIdentity } from '../utils/validators';
import { logger } from '../utils/logger';

const TOKEN_TTL_SECONDS = 24 * 60 * 60;

// Extend Express Request globally to include the authenticated caller
declare global {
  namespace Express {
    interface Request {
      user?: Identity;
    }
  }
}

/** Verify a JWT and return the caller's identity, or null if invalid/expired */
export function verifyToken(token: string, secret: string): Identity | null {
  try {
    return parseIdentity(jwt.verify(token, secret));
  } catch (err) {
    logger.debug('JWT verification failed', { error: errorMessage(err) });
    return null;
  }
}

/** Generate a JWT with 24-hour expiry containing userId and role */
export function generateToken(identity: Identity, secret: string): string {
  return jwt.sign({ userId: identity.userId, role: identity.role }, secret, {
    expiresIn: TOKEN_TTL_SECONDS,
  });
}

/** Pull the token out of an `Authorization: Bearer <token>` header */
export function bearerToken(header: string | undefined): string | null {
  if (!header?.startsWith('Bearer ')) return null;
  const token = header.slice(7).trim();
  return token.length > 0 ? token : null;
}

/**
 * Express middleware: attaches the decoded identity to req.user.
 * Missing or invalid tokens go to the error handler as 401.
 */
export function authMiddleware(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      next(new UnauthenticatedError('Missing or invalid authorization header'));
      return;
    }

    const identity = verifyToken(token, secret);
    if (!identity) {
      logger.warn('Rejected token', { path: req.path });
      next(new UnauthenticatedError('Invalid or expired token'));
      return;
    }

    req.user = identity;
    next();
  };
}
