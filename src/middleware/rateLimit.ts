// src/middleware/rateLimit.ts
// Per-route rate limiting for the credential endpoints.

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { getConfig } from '../config';

/** Route options fragment: `app.post('/login', authRateLimit(), handler)`. */
export function authRateLimit() {
  const { rateLimit: limits } = getConfig();
  return {
    config: {
      rateLimit: { max: limits.authMax, timeWindow: limits.authWindow },
    },
  };
}

/**
 * Authenticated callers are keyed by user id, everyone else by IP.
 */
function getClientKey(request: FastifyRequest): string {
  if (request.user) {
    return `user:${request.user.id}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the plugin before routes; nothing is limited unless a route opts in.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    global: false,

    max: 100,
    timeWindow: '1 minute',

    keyGenerator: getClientKey,

    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'rate_limited',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),

    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}
