/**
 * WebhookSecretGuard: constant-time check of the secret path segment.
 *
 * Both sides are hashed to fixed-length digests before comparison, and a
 * placeholder digest stands in when the integration or its secret is missing,
 * so every request does the same comparison work.
 */
import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';

import { WebhookSecretMismatchError } from '@/core/errors.js';
import { toIntegrationId } from '@/core/types.js';
import type { IntegrationSecretStore } from '@/integrations/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import { WEBHOOK_SECRET_FIELD } from '@/secrets/webhook-secret.js';

import type { GuardResult, WebhookSecretGuard } from './types.js';

interface WebhookSecretGuardDeps {
  store: IntegrationSecretStore;
  logger: Logger;
  counters: SecurityCounters;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function createWebhookSecretGuard(deps: WebhookSecretGuardDeps): WebhookSecretGuard {
  const { store, logger, counters } = deps;
  const mismatch = new WebhookSecretMismatchError();
  const placeholderDigest = createHash('sha256').update(randomBytes(32)).digest();

  return {
    async validate(integrationId: string, suppliedSecret: string): Promise<GuardResult> {
      const integration = await store.getById(toIntegrationId(integrationId));
      const expected = integration?.secrets[WEBHOOK_SECRET_FIELD];

      const matches = timingSafeEqual(
        digest(suppliedSecret),
        expected !== undefined ? digest(expected) : placeholderDigest,
      );

      if (integration === null || expected === undefined || !matches) {
        counters.increment('webhook_rejected');
        // routine scanning traffic; keep below info
        logger.debug('Webhook secret rejected', {
          component: 'webhook-secret-guard',
          integrationId,
          code: mismatch.code,
        });
        return { ok: false, error: mismatch };
      }

      return { ok: true, integration };
    },
  };
}
