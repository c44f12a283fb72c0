/**
 * WebhookReceiver: runs an inbound delivery through every check in order:
 *
 *   secret guard → platform match → enabled → platform signature
 *   → payload decode → (Slack URL verification) → dispatch
 *
 * The guard runs before the body is looked at. A wrong secret, an unknown id
 * and a platform mismatch all produce the same `not_found` outcome.
 */
import { normalizePlatformId } from '@/integrations/platforms.js';
import type { Logger } from '@/observability/logger.js';
import type { SecurityCounters } from '@/observability/security-counters.js';

import { parseWebhookPayload } from './payload.js';
import { headerValue } from './signature-verifiers.js';
import type {
  InboundDispatcher,
  InboundWebhookRequest,
  SignatureVerifiers,
  WebhookOutcome,
  WebhookSecretGuard,
} from './types.js';

export interface WebhookReceiverDeps {
  guard: WebhookSecretGuard;
  verifiers: SignatureVerifiers;
  dispatcher: InboundDispatcher;
  logger: Logger;
  counters: SecurityCounters;
  now?: () => Date;
}

export interface WebhookReceiver {
  receive(request: InboundWebhookRequest): Promise<WebhookOutcome>;
}

/** Slack's one-time endpoint check: `{ "type": "url_verification", "challenge": "..." }`. */
function readSlackChallenge(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null) return undefined;
  if (!('type' in payload) || payload.type !== 'url_verification') return undefined;
  if (!('challenge' in payload) || typeof payload.challenge !== 'string') return undefined;
  return payload.challenge;
}

export function createWebhookReceiver(deps: WebhookReceiverDeps): WebhookReceiver {
  const { guard, verifiers, dispatcher, counters } = deps;
  const logger = deps.logger.child({ component: 'webhook-receiver' });
  const now = deps.now ?? ((): Date => new Date());

  return {
    async receive(request: InboundWebhookRequest): Promise<WebhookOutcome> {
      const receivedAt = now();

      // 1. Secret guard
      const guarded = await guard.validate(request.integrationId, request.webhookSecret);
      if (!guarded.ok) return { kind: 'not_found' };
      const { integration } = guarded;

      // 2. The URL's platform must be the integration's
      if (normalizePlatformId(request.platform) !== integration.platformId) {
        counters.increment('webhook_rejected');
        logger.debug('Webhook platform does not match integration', {
          component: 'webhook-receiver',
          integrationId: integration.id,
          platform: request.platform,
        });
        return { kind: 'not_found' };
      }

      // 3. Disabled integrations answer 503 so the platform retries later
      if (!integration.isEnabled) {
        logger.info('Webhook received for disabled integration', {
          component: 'webhook-receiver',
          tenantId: integration.tenantId,
          integrationId: integration.id,
        });
        return { kind: 'disabled' };
      }

      // 4. Platform signature
      const verification = verifiers[integration.platformId].verify({
        integration,
        headers: request.headers,
        rawBody: request.rawBody,
        receivedAt,
      });
      if (!verification.ok) {
        counters.increment('webhook_signature_failed');
        logger.warn('Webhook signature verification failed', {
          component: 'webhook-receiver',
          tenantId: integration.tenantId,
          integrationId: integration.id,
          platformId: integration.platformId,
          reason: verification.reason,
        });
        return { kind: 'unauthorized' };
      }

      // 5. Payload, decoded only once both layers passed
      const contentType = headerValue(request.headers, 'content-type');
      const parsed = parseWebhookPayload(request.rawBody, contentType);
      if (!parsed.ok) {
        return { kind: 'bad_request', message: parsed.error };
      }

      // 6. Slack URL verification
      if (integration.platformId === 'slack') {
        const challenge = readSlackChallenge(parsed.value);
        if (challenge !== undefined) {
          logger.info('Answered Slack URL verification', {
            component: 'webhook-receiver',
            integrationId: integration.id,
          });
          return { kind: 'challenge', challenge };
        }
      }

      await dispatcher.dispatch({
        tenantId: integration.tenantId,
        integrationId: integration.id,
        platformId: integration.platformId,
        contentType,
        payload: parsed.value,
        receivedAt,
      });
      return { kind: 'accepted' };
    },
  };
}
