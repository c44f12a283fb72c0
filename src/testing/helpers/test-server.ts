/**
 * Test server helper for cross-module tests.
 * Builds the full gateway over an in-memory repository, with a recording dispatcher.
 */
import type { FastifyInstance } from 'fastify';

import { createServer } from '@/api/server.js';
import { createInMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import type { InMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import { createIntegrationSecretStore } from '@/integrations/integration-secret-store.js';
import type { IntegrationSecretStore } from '@/integrations/types.js';
import { createSecurityCounters } from '@/observability/security-counters.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import type { KeyRing } from '@/secrets/types.js';
import { createSignatureVerifiers } from '@/webhooks/signature-verifiers.js';
import type { InboundDispatcher, InboundWebhookEvent } from '@/webhooks/types.js';
import { createWebhookReceiver } from '@/webhooks/webhook-receiver.js';
import { createWebhookSecretGuard } from '@/webhooks/webhook-secret-guard.js';

import { createTestKeyRing } from '../fixtures/keys.js';
import { createMockLogger } from '../fixtures/logger.js';
import type { MockLogger } from '../fixtures/logger.js';

/** Options for creating a test server. */
export interface TestServerOptions {
  keyRing?: KeyRing;
  /** Share a repository between servers, e.g. to simulate a restart with a rotated key ring. */
  repository?: InMemoryAppIntegrationRepository;
  publicBaseUrl?: string;
  now?: () => Date;
}

export interface TestServer {
  server: FastifyInstance;
  store: IntegrationSecretStore;
  repository: InMemoryAppIntegrationRepository;
  counters: SecurityCounters;
  logger: MockLogger;
  /** Every event the dispatcher received, in order. */
  dispatched: InboundWebhookEvent[];
}

/** Create a gateway server wired like production, minus the database. */
export async function createTestServer(options: TestServerOptions = {}): Promise<TestServer> {
  const logger = createMockLogger();
  const counters = createSecurityCounters();
  const repository = options.repository ?? createInMemoryAppIntegrationRepository();
  const keyRing = options.keyRing ?? createTestKeyRing();

  const store = createIntegrationSecretStore({ repository, keyRing, logger, counters });

  const dispatched: InboundWebhookEvent[] = [];
  const dispatcher: InboundDispatcher = {
    dispatch(event: InboundWebhookEvent): Promise<void> {
      dispatched.push(event);
      return Promise.resolve();
    },
  };

  const webhookReceiver = createWebhookReceiver({
    guard: createWebhookSecretGuard({ store, logger, counters }),
    verifiers: createSignatureVerifiers({ slackToleranceSeconds: 300, logger, now: options.now }),
    dispatcher,
    logger,
    counters,
    now: options.now,
  });

  const server = await createServer(
    {
      integrationStore: store,
      webhookReceiver,
      counters,
      publicBaseUrl: options.publicBaseUrl,
      logger,
    },
    { rateLimitMax: 1000 },
  );
  await server.ready();

  return { server, store, repository, counters, logger, dispatched };
}
