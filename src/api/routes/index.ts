/**
 * Route registration: registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';

import type { RouteDependencies } from '../types.js';

import { appWebhookRoutes } from './app-webhooks.js';
import { integrationRoutes } from './integrations.js';

/** Register the tenant management API (mounted under /api/v1). */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(integrationRoutes, deps);
}

/** Register inbound webhook endpoints (mounted at the root, matching the URLs handed to tenants). */
export async function registerWebhookRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(appWebhookRoutes, deps);
}
