/**
 * Fastify app assembly: security plugins, error handler, health and routes.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import { registerErrorHandler } from './error-handler.js';
import { registerRoutes, registerWebhookRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ServerOptions {
  /** Requests per client per minute, across all routes. */
  rateLimitMax?: number;
  /** Largest accepted request body in bytes. */
  bodyLimit?: number;
}

const DEFAULT_RATE_LIMIT_MAX = 100;
const DEFAULT_BODY_LIMIT = 1024 * 1024;

/** Build a ready-to-listen Fastify instance. */
export async function createServer(
  deps: RouteDependencies,
  options: ServerOptions = {},
): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false,
    bodyLimit: options.bodyLimit ?? DEFAULT_BODY_LIMIT,
  });

  await server.register(helmet);
  await server.register(rateLimit, {
    max: options.rateLimitMax ?? DEFAULT_RATE_LIMIT_MAX,
    timeWindow: '1 minute',
  });

  registerErrorHandler(server);

  server.get('/health', () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      security: deps.counters.snapshot(),
    };
  });

  await server.register(
    async (prefixed) => {
      await prefixed.register(registerRoutes, deps);
    },
    { prefix: '/api/v1' },
  );
  await server.register(registerWebhookRoutes, deps);

  return server;
}
