/**
 * Fastify plugin for the loopback redirect.
 *
 * Usage:
 *   const surface = new CallbackSurface({ open: openBrowser, logger });
 *   const auth = await createAuthClient({ config, surface, logger });
 *   await app.register(authPlugin, { surface, auth, prefix: '/auth' });
 *
 * Registered through fastify-plugin, so routes land on the parent instance;
 * use the `prefix` option rather than register's own.
 */

import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { parseCallbackParams, renderCallbackPage, silentLogger } from '@authsession/core';
import type { AuthClient, CallbackSurface, Logger } from '@authsession/core';

export interface AuthPluginOptions {
  surface: CallbackSurface;
  /** Enables POST /logout */
  auth?: AuthClient;
  logger?: Logger;
  /** Route prefix (default: '') */
  prefix?: string;
}

function queryOf(request: FastifyRequest): URLSearchParams {
  return new URL(request.url, 'http://localhost').searchParams;
}

const authRoutes: FastifyPluginAsync<AuthPluginOptions> = async (fastify, opts) => {
  const prefix = opts.prefix ?? '';
  const logger = opts.logger ?? silentLogger;
  const { surface, auth } = opts;

  fastify.get(`${prefix}/login`, async (_request, reply) => {
    const url = surface.pendingUrl();
    if (!url) {
      return reply.status(404).send({
        error: { code: 'AUTH_NO_PENDING_FLOW', message: 'No sign-in is in progress' },
      });
    }
    return reply.redirect(url);
  });

  fastify.get(`${prefix}/callback`, async (request, reply) => {
    const params = queryOf(request);
    if (!surface.handleCallback(params)) {
      logger.warn('Callback did not match a pending sign-in');
      return reply.status(400).send({
        error: { code: 'AUTH_INVALID_CALLBACK', message: 'Callback does not match a pending sign-in' },
      });
    }
    return reply.type('text/html; charset=utf-8').send(renderCallbackPage(parseCallbackParams(params)));
  });

  if (auth) {
    fastify.post(`${prefix}/logout`, async (_request, reply) => {
      try {
        return reply.send(await auth.endSession());
      } catch (error) {
        logger.error('Logout failed', error);
        return reply.status(500).send({ error: { code: 'AUTH_LOGOUT_FAILED', message: 'Logout failed' } });
      }
    });
  }
};

export const authPlugin = fp(authRoutes, { name: 'authsession', fastify: '4.x' });
