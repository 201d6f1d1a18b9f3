/**
 * Express routes for the loopback redirect.
 *
 * Mount the router where the configured redirect URI points:
 *
 *   const surface = new CallbackSurface({ open: openBrowser, logger });
 *   const auth = await createAuthClient({ config, surface, logger });
 *   app.use('/auth', createAuthRouter({ surface, auth, logger }));
 *
 * The provider redirects to /auth/callback, which completes the pending
 * login() call.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { parseCallbackParams, renderCallbackPage, silentLogger } from '@authsession/core';
import type { AuthClient, CallbackSurface, Logger } from '@authsession/core';

export interface AuthRouterOptions {
  surface: CallbackSurface;
  /** Enables POST /logout */
  auth?: AuthClient;
  logger?: Logger;
}

function queryOf(req: Request): URLSearchParams {
  return new URL(req.originalUrl, 'http://localhost').searchParams;
}

export function createAuthRouter(opts: AuthRouterOptions): Router {
  const router = Router();
  const logger = opts.logger ?? silentLogger;
  const { surface, auth } = opts;

  // ------------------------------------------------------------------
  // GET /login: Redirect to the authorization URL awaiting its callback
  // ------------------------------------------------------------------
  router.get('/login', (_req: Request, res: Response) => {
    const url = surface.pendingUrl();
    if (!url) {
      res.status(404).json({
        error: { code: 'AUTH_NO_PENDING_FLOW', message: 'No sign-in is in progress' },
      });
      return;
    }
    res.redirect(url);
  });

  // ------------------------------------------------------------------
  // GET /callback: Hand the provider redirect to the pending flow
  // ------------------------------------------------------------------
  router.get('/callback', (req: Request, res: Response) => {
    const params = queryOf(req);
    if (!surface.handleCallback(params)) {
      logger.warn('Callback did not match a pending sign-in');
      res.status(400).json({
        error: { code: 'AUTH_INVALID_CALLBACK', message: 'Callback does not match a pending sign-in' },
      });
      return;
    }
    res.type('html').send(renderCallbackPage(parseCallbackParams(params)));
  });

  // ------------------------------------------------------------------
  // POST /logout: Clear the session, return the provider logout URL
  // ------------------------------------------------------------------
  if (auth) {
    router.post('/logout', async (_req: Request, res: Response) => {
      try {
        res.json(await auth.endSession());
      } catch (error) {
        logger.error('Logout failed', error);
        res.status(500).json({ error: { code: 'AUTH_LOGOUT_FAILED', message: 'Logout failed' } });
      }
    });
  }

  return router;
}
