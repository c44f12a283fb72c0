/**
 * Tenant integration CRUD routes.
 *
 * Secrets leave this layer masked. The full webhook URL (which embeds the
 * webhook secret) is returned only by create and rotate; every other response
 * carries a masked copy.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ValidationError } from '@/core/errors.js';
import { toIntegrationId, toTenantId } from '@/core/types.js';
import { PLATFORM_DISPLAY_NAMES, normalizePlatformId } from '@/integrations/platforms.js';
import type { PlatformId } from '@/integrations/platforms.js';
import type { AppIntegration, AppIntegrationFilter, SecretsStatus } from '@/integrations/types.js';
import { maskSecretBundle, maskSecretValue } from '@/secrets/secret-masker.js';
import type { MaskedSecretBundle } from '@/secrets/types.js';
import { WEBHOOK_SECRET_FIELD } from '@/secrets/webhook-secret.js';

import { sendNotFound, sendSuccess } from '../error-handler.js';
import { paginate, paginationSchema } from '../pagination.js';
import type { RouteDependencies } from '../types.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const tenantParamsSchema = z.object({
  tenantId: z.string().min(1),
});

const integrationParamsSchema = tenantParamsSchema.extend({
  id: z.string().min(1),
});

const listQuerySchema = paginationSchema.extend({
  platformId: z.string().min(1).optional(),
  enabled: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

const createIntegrationSchema = z.object({
  platformId: z.string().min(1),
  name: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  configuration: z.record(z.unknown()).optional(),
  secrets: z.record(z.string()).optional(),
  isEnabled: z.boolean().optional(),
  createdBy: z.string().min(1),
});

const updateIntegrationSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  description: z.string().max(2000).optional(),
  /** Merged key by key; `null` removes a key. */
  configuration: z.record(z.unknown()).optional(),
  /** Merged field by field; `null` removes a field. */
  secrets: z.record(z.string().nullable()).optional(),
  isEnabled: z.boolean().optional(),
  updatedBy: z.string().min(1),
});

const rotateWebhookSecretSchema = z.object({
  updatedBy: z.string().min(1),
});

// ─── Response Shaping ───────────────────────────────────────────

/** What an integration looks like on the wire. Never carries `secretsEncrypted`. */
export interface IntegrationView {
  id: string;
  tenantId: string;
  platformId: PlatformId;
  platformName: string;
  name: string;
  description?: string;
  configuration: Record<string, unknown>;
  secrets: MaskedSecretBundle;
  secretsStatus: SecretsStatus;
  isEnabled: boolean;
  createdBy: string;
  updatedBy?: string;
  createdAt: Date;
  updatedAt: Date;
  webhookUrl: string | null;
}

/** `{publicBaseUrl}/webhooks/{platform}/{integrationId}/{webhookSecret}` */
export function buildWebhookUrl(
  publicBaseUrl: string | undefined,
  platformId: PlatformId,
  integrationId: string,
  webhookSecret: string,
): string {
  const base = (publicBaseUrl ?? '').replace(/\/+$/, '');
  return `${base}/webhooks/${platformId}/${integrationId}/${webhookSecret}`;
}

function toView(
  integration: AppIntegration,
  publicBaseUrl: string | undefined,
  revealWebhookUrl: boolean,
): IntegrationView {
  const webhookSecret = integration.secrets[WEBHOOK_SECRET_FIELD];
  const webhookUrl =
    webhookSecret === undefined
      ? null
      : buildWebhookUrl(
          publicBaseUrl,
          integration.platformId,
          integration.id,
          revealWebhookUrl ? webhookSecret : maskSecretValue(webhookSecret),
        );

  return {
    id: integration.id,
    tenantId: integration.tenantId,
    platformId: integration.platformId,
    platformName: PLATFORM_DISPLAY_NAMES[integration.platformId],
    name: integration.name,
    description: integration.description,
    configuration: integration.configuration,
    secrets: maskSecretBundle(integration.secrets),
    secretsStatus: integration.secretsStatus,
    isEnabled: integration.isEnabled,
    createdBy: integration.createdBy,
    updatedBy: integration.updatedBy,
    createdAt: integration.createdAt,
    updatedAt: integration.updatedAt,
    webhookUrl,
  };
}

function parsePlatformFilter(value: string | undefined): PlatformId | undefined {
  if (value === undefined) return undefined;
  const platformId = normalizePlatformId(value);
  if (platformId === undefined) {
    throw new ValidationError(`Unsupported platform: ${value}`, { platform: value });
  }
  return platformId;
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register tenant integration CRUD routes. */
export async function integrationRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { integrationStore, publicBaseUrl, logger } = deps;

  // ─── GET /tenants/:tenantId/integrations ───────────────────────

  fastify.get('/tenants/:tenantId/integrations', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const query = listQuerySchema.parse(request.query);

    const filter: AppIntegrationFilter = {
      tenantId: toTenantId(tenantId),
      platformId: parsePlatformFilter(query.platformId),
      isEnabled: query.enabled,
    };
    const integrations = await integrationStore.getAll(filter);
    const views = integrations.map((integration) => toView(integration, publicBaseUrl, false));

    return sendSuccess(reply, paginate(views, query));
  });

  // ─── POST /tenants/:tenantId/integrations ──────────────────────

  fastify.post('/tenants/:tenantId/integrations', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const input = createIntegrationSchema.parse(request.body);

    const integration = await integrationStore.create({
      tenantId: toTenantId(tenantId),
      ...input,
    });

    logger.info('Integration created via API', {
      component: 'integration-routes',
      tenantId,
      integrationId: integration.id,
      platformId: integration.platformId,
    });

    return sendSuccess(reply, toView(integration, publicBaseUrl, true), 201);
  });

  // ─── GET /tenants/:tenantId/integrations/:id ───────────────────

  fastify.get('/tenants/:tenantId/integrations/:id', async (request, reply) => {
    const { tenantId, id } = integrationParamsSchema.parse(request.params);

    const integration = await integrationStore.getForTenant(
      toTenantId(tenantId),
      toIntegrationId(id),
    );
    if (integration === null) {
      return sendNotFound(reply, 'Integration', id);
    }

    return sendSuccess(reply, toView(integration, publicBaseUrl, false));
  });

  // ─── PUT /tenants/:tenantId/integrations/:id ───────────────────

  fastify.put('/tenants/:tenantId/integrations/:id', async (request, reply) => {
    const { tenantId, id } = integrationParamsSchema.parse(request.params);
    const input = updateIntegrationSchema.parse(request.body);

    const integration = await integrationStore.update(
      toTenantId(tenantId),
      toIntegrationId(id),
      input,
    );

    return sendSuccess(reply, toView(integration, publicBaseUrl, false));
  });

  // ─── POST /tenants/:tenantId/integrations/:id/webhook-secret/rotate

  fastify.post('/tenants/:tenantId/integrations/:id/webhook-secret/rotate', async (request, reply) => {
    const { tenantId, id } = integrationParamsSchema.parse(request.params);
    const { updatedBy } = rotateWebhookSecretSchema.parse(request.body);

    const integration = await integrationStore.rotateWebhookSecret(
      toTenantId(tenantId),
      toIntegrationId(id),
      updatedBy,
    );

    return sendSuccess(reply, toView(integration, publicBaseUrl, true));
  });

  // ─── DELETE /tenants/:tenantId/integrations/:id ────────────────

  fastify.delete('/tenants/:tenantId/integrations/:id', async (request, reply) => {
    const { tenantId, id } = integrationParamsSchema.parse(request.params);

    const deleted = await integrationStore.delete(toTenantId(tenantId), toIntegrationId(id));
    if (!deleted) {
      return sendNotFound(reply, 'Integration', id);
    }

    return sendSuccess(reply, { deleted: true });
  });
}
