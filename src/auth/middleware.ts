/**
 * Auth Middleware
 *
 * Fastify preHandler hook that lets public routes through and otherwise
 * requires a valid access token, attaching the user to the request.
 */

import type { FastifyRequest, FastifyReply, FastifyInstance } from 'fastify';
import { createLogger } from '../observability/logger';
import { extractBearerToken } from './jwt';
import type { AuthUser, IdentityVerifier } from './identity';

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthUser;
  }
}

const log = createLogger('auth');

const PUBLIC_AUTH_ROUTES = ['/auth/register', '/auth/login', '/auth/refresh'];

export function isPublicRoute(url: string, method: string, apiPrefix: string): boolean {
  const path = url.split('?')[0];

  if (method === 'OPTIONS') return true;
  if (path === '/health' || path.startsWith('/health/') || path === '/metrics') return true;

  // WebSocket upgrades authenticate with ?token= in the socket handler
  if (path.startsWith(`${apiPrefix}/ws/`)) return true;

  return PUBLIC_AUTH_ROUTES.some((route) => path === `${apiPrefix}${route}`);
}

export function createAuthMiddleware(identity: IdentityVerifier, apiPrefix: string) {
  return async function authMiddleware(
    req: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    if (isPublicRoute(req.url, req.method, apiPrefix)) {
      return;
    }

    const token = extractBearerToken(req.headers.authorization);
    const user = await identity.verify(token);

    if (!user) {
      log.debug({ url: req.url, hasToken: token !== null }, 'denied');
      reply.status(401).send({
        error: 'unauthorized',
        message: token ? 'Invalid or expired token' : 'Authentication required',
      });
      return;
    }

    req.user = user;
  };
}

export function registerAuthMiddleware(
  app: FastifyInstance,
  identity: IdentityVerifier,
  apiPrefix: string
): void {
  app.addHook('preHandler', createAuthMiddleware(identity, apiPrefix));
}

/**
 * Narrow `req.user` inside a handler; replies 401 when absent.
 */
export function requireUser(req: FastifyRequest, reply: FastifyReply): AuthUser | null {
  if (!req.user) {
    reply.status(401).send({
      error: 'unauthorized',
      message: 'Authentication required',
    });
    return null;
  }
  return req.user;
}
