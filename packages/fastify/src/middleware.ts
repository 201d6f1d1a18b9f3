/**
 * requireAuth() preHandler for Fastify routes.
 *
 * Fetches a fresh access token from the client (refreshing it when needed)
 * and attaches it to request.accessToken.
 *
 * Usage:
 *   app.get('/api/profile', { preHandler: [requireAuth(auth)] }, handler);
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { NotAuthenticatedError } from '@authsession/core';
import type { AccessTokenSource } from '@authsession/core';

declare module 'fastify' {
  interface FastifyRequest {
    accessToken?: string;
  }
}

export function requireAuth(auth: AccessTokenSource) {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    try {
      request.accessToken = await auth.getToken();
      return undefined;
    } catch (error) {
      if (!(error instanceof NotAuthenticatedError)) {
        throw error;
      }
      return reply.status(401).send({
        error: { code: 'AUTH_NOT_AUTHENTICATED', message: 'Sign-in is required' },
      });
    }
  };
}
