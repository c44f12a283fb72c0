import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { toTenantId } from '@/core/types.js';
import { createInMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import { createIntegrationSecretStore } from '@/integrations/integration-secret-store.js';
import type { AppIntegration, IntegrationSecretStore } from '@/integrations/types.js';
import { createSecurityCounters } from '@/observability/security-counters.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import { createTestKeyRing } from '@/testing/fixtures/keys.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

import { computeGenericSignature, computeSlackSignature, createSignatureVerifiers } from './signature-verifiers.js';
import type { InboundDispatcher, InboundWebhookEvent } from './types.js';
import { createWebhookReceiver } from './webhook-receiver.js';
import type { WebhookReceiver } from './webhook-receiver.js';
import { createWebhookSecretGuard } from './webhook-secret-guard.js';

const NOW = new Date('2026-03-01T12:00:00Z');
const NOW_SECONDS = String(Math.floor(NOW.getTime() / 1000));
const TENANT = toTenantId('tenant-a');

describe('WebhookReceiver', () => {
  let store: IntegrationSecretStore;
  let counters: SecurityCounters;
  let dispatch: Mock<(event: InboundWebhookEvent) => Promise<void>>;
  let receiver: WebhookReceiver;

  beforeEach(() => {
    const logger = createMockLogger();
    counters = createSecurityCounters();
    store = createIntegrationSecretStore({
      repository: createInMemoryAppIntegrationRepository(),
      keyRing: createTestKeyRing(),
      logger,
      counters,
    });
    dispatch = vi.fn<(event: InboundWebhookEvent) => Promise<void>>().mockResolvedValue(undefined);
    const dispatcher: InboundDispatcher = { dispatch };

    receiver = createWebhookReceiver({
      guard: createWebhookSecretGuard({ store, logger, counters }),
      verifiers: createSignatureVerifiers({ slackToleranceSeconds: 300, logger, now: () => NOW }),
      dispatcher,
      logger,
      counters,
      now: () => NOW,
    });
  });

  async function createSlack(isEnabled = true): Promise<AppIntegration> {
    return store.create({
      tenantId: TENANT,
      platformId: 'slack',
      name: 'Slack',
      secrets: { signingSecret: 'test-signing-secret' },
      isEnabled,
      createdBy: 'user-1',
    });
  }

  function slackHeaders(body: Buffer): Record<string, string> {
    return {
      'content-type': 'application/json',
      'x-slack-request-timestamp': NOW_SECONDS,
      'x-slack-signature': computeSlackSignature('test-signing-secret', NOW_SECONDS, body),
    };
  }

  it('dispatches a correctly signed Slack event', async () => {
    const integration = await createSlack();
    const body = Buffer.from('{"type":"event_callback","event":{"type":"app_mention"}}');

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: slackHeaders(body),
      rawBody: body,
    });

    expect(outcome).toEqual({ kind: 'accepted' });
    expect(dispatch).toHaveBeenCalledWith({
      tenantId: TENANT,
      integrationId: integration.id,
      platformId: 'slack',
      contentType: 'application/json',
      payload: { type: 'event_callback', event: { type: 'app_mention' } },
      receivedAt: NOW,
    });
  });

  it('returns not_found for a wrong secret before looking at the body', async () => {
    const integration = await createSlack();

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: 'x'.repeat(32),
      headers: {},
      rawBody: Buffer.from('not even json'),
    });

    expect(outcome).toEqual({ kind: 'not_found' });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('returns not_found when the URL platform differs from the integration', async () => {
    const integration = await createSlack();

    const outcome = await receiver.receive({
      platform: 'msteams',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: {},
      rawBody: Buffer.alloc(0),
    });

    expect(outcome).toEqual({ kind: 'not_found' });
    expect(counters.snapshot().webhook_rejected).toBe(1);
  });

  it('returns disabled for a disabled integration with a valid secret', async () => {
    const integration = await createSlack(false);

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: {},
      rawBody: Buffer.alloc(0),
    });

    expect(outcome).toEqual({ kind: 'disabled' });
  });

  it('answers the Slack URL verification challenge', async () => {
    const integration = await createSlack();
    const body = Buffer.from('{"type":"url_verification","challenge":"test-challenge"}');

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: slackHeaders(body),
      rawBody: body,
    });

    expect(outcome).toEqual({ kind: 'challenge', challenge: 'test-challenge' });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('does not echo an unsigned Slack challenge', async () => {
    const integration = await createSlack();
    const body = Buffer.from('{"type":"url_verification","challenge":"unsigned-challenge"}');

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: { 'content-type': 'application/json' },
      rawBody: body,
    });

    expect(outcome).toEqual({ kind: 'unauthorized' });
    expect(counters.snapshot().webhook_signature_failed).toBe(1);
  });

  it('returns unauthorized when the Slack signature is wrong', async () => {
    const integration = await createSlack();
    const body = Buffer.from('{"type":"event_callback"}');

    const outcome = await receiver.receive({
      platform: 'slack',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: { ...slackHeaders(body), 'x-slack-signature': 'v0=deadbeef' },
      rawBody: body,
    });

    expect(outcome).toEqual({ kind: 'unauthorized' });
    expect(counters.snapshot().webhook_signature_failed).toBe(1);
  });

  it('accepts a generic webhook through its alias and verifies its HMAC', async () => {
    const integration = await store.create({
      tenantId: TENANT,
      platformId: 'webhook',
      name: 'Orders',
      secrets: { secret: 'test-hmac' },
      createdBy: 'user-1',
    });
    const body = Buffer.from('{"order":42}');

    const outcome = await receiver.receive({
      platform: 'generic',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: {
        'content-type': 'application/json',
        'x-webhook-signature': `sha256=${computeGenericSignature('test-hmac', body)}`,
      },
      rawBody: body,
    });

    expect(outcome).toEqual({ kind: 'accepted' });
    expect(dispatch).toHaveBeenCalledWith(expect.objectContaining({ payload: { order: 42 } }));
  });

  it('returns bad_request for an authenticated but malformed body', async () => {
    const integration = await store.create({
      tenantId: TENANT,
      platformId: 'webhook',
      name: 'Orders',
      createdBy: 'user-1',
    });

    const outcome = await receiver.receive({
      platform: 'webhook',
      integrationId: integration.id,
      webhookSecret: integration.secrets['webhookSecret'] ?? '',
      headers: { 'content-type': 'application/json' },
      rawBody: Buffer.from('{broken'),
    });

    expect(outcome).toEqual({ kind: 'bad_request', message: 'Request body is not valid JSON' });
  });
});
