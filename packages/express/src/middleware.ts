/**
 * requireAuth() middleware for Express routes.
 *
 * Fetches a fresh access token from the client (refreshing it when needed)
 * and attaches it to req.accessToken for calls to downstream APIs.
 *
 * Usage:
 *   app.get('/api/profile', requireAuth(auth), handler);
 */

import type { Request, Response, NextFunction } from 'express';
import { NotAuthenticatedError } from '@authsession/core';
import type { AccessTokenSource } from '@authsession/core';

declare global {
  namespace Express {
    interface Request {
      accessToken?: string;
    }
  }
}

export function requireAuth(auth: AccessTokenSource) {
  return async function authenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
    let token: string;
    try {
      token = await auth.getToken();
    } catch (error) {
      if (!(error instanceof NotAuthenticatedError)) {
        next(error);
        return;
      }
      res.status(401).json({
        error: { code: 'AUTH_NOT_AUTHENTICATED', message: 'Sign-in is required' },
      });
      return;
    }

    req.accessToken = token;
    next();
  };
}
