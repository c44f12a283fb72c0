import { beforeEach, describe, expect, it } from 'vitest';

import { WebhookSecretMismatchError } from '@/core/errors.js';
import { toTenantId } from '@/core/types.js';
import { createInMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import type { InMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import { createIntegrationSecretStore } from '@/integrations/integration-secret-store.js';
import type { AppIntegration, IntegrationSecretStore } from '@/integrations/types.js';
import { createSecurityCounters } from '@/observability/security-counters.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import { createKeyRing } from '@/secrets/key-ring.js';
import { TEST_KEY_2, createTestKeyRing } from '@/testing/fixtures/keys.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import type { MockLogger } from '@/testing/fixtures/logger.js';

import { createWebhookSecretGuard } from './webhook-secret-guard.js';
import type { WebhookSecretGuard } from './types.js';

describe('WebhookSecretGuard', () => {
  let repository: InMemoryAppIntegrationRepository;
  let store: IntegrationSecretStore;
  let logger: MockLogger;
  let counters: SecurityCounters;
  let guard: WebhookSecretGuard;
  let integration: AppIntegration;
  let webhookSecret: string;

  beforeEach(async () => {
    logger = createMockLogger();
    counters = createSecurityCounters();
    repository = createInMemoryAppIntegrationRepository();
    store = createIntegrationSecretStore({
      repository,
      keyRing: createTestKeyRing(),
      logger,
      counters,
    });
    guard = createWebhookSecretGuard({ store, logger, counters });

    integration = await store.create({
      tenantId: toTenantId('tenant-a'),
      platformId: 'webhook',
      name: 'Orders',
      createdBy: 'user-1',
    });
    webhookSecret = integration.secrets['webhookSecret'] ?? '';
  });

  it('accepts the stored secret and returns the decrypted integration', async () => {
    const result = await guard.validate(integration.id, webhookSecret);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.integration.id).toBe(integration.id);
      expect(result.integration.secrets['webhookSecret']).toBe(webhookSecret);
    }
  });

  it('rejects a wrong secret', async () => {
    const wrong = `${webhookSecret.slice(0, -1)}${webhookSecret.endsWith('A') ? 'B' : 'A'}`;

    expect(await guard.validate(integration.id, wrong)).toMatchObject({ ok: false });
  });

  it('rejects an unknown integration id with the same result', async () => {
    const wrong = `${webhookSecret.slice(0, -1)}${webhookSecret.endsWith('A') ? 'B' : 'A'}`;
    const unknown = await guard.validate('does-not-exist', webhookSecret);

    expect(unknown).toEqual(await guard.validate(integration.id, wrong));
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(unknown.error).toBeInstanceOf(WebhookSecretMismatchError);
      expect(unknown.error.statusCode).toBe(404);
    }
  });

  it('rejects an empty secret', async () => {
    expect(await guard.validate(integration.id, '')).toMatchObject({ ok: false });
  });

  it('rejects every secret once the stored one cannot be decrypted', async () => {
    const strandedGuard = createWebhookSecretGuard({
      store: createIntegrationSecretStore({
        repository,
        keyRing: createKeyRing({ activeKeyId: 'k2', keys: [{ id: 'k2', key: TEST_KEY_2 }] }),
        logger,
        counters,
      }),
      logger,
      counters,
    });

    expect(await strandedGuard.validate(integration.id, webhookSecret)).toMatchObject({ ok: false });
  });

  it('counts rejections and logs them at debug level only', async () => {
    await guard.validate(integration.id, 'wrong-secret');
    await guard.validate('unknown', 'wrong-secret');

    expect(counters.snapshot().webhook_rejected).toBe(2);
    expect(logger.debug).toHaveBeenCalledWith('Webhook secret rejected', {
      component: 'webhook-secret-guard',
      integrationId: 'unknown',
    });
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });
});
