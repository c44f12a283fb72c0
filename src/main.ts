import 'dotenv/config';

import { createServer } from '@/api/server.js';
import { loadGatewayConfig, loadGatewayConfigFromEnv } from '@/config/loader.js';
import type { GatewayConfig } from '@/config/types.js';
import { StartupConfigurationError } from '@/core/errors.js';
import { createDatabase } from '@/infrastructure/database.js';
import type { Database } from '@/infrastructure/database.js';
import { createAppIntegrationRepository } from '@/infrastructure/repositories/app-integration-repository.js';
import { createInMemoryAppIntegrationRepository } from '@/infrastructure/repositories/in-memory-app-integration-repository.js';
import { createIntegrationSecretStore } from '@/integrations/integration-secret-store.js';
import type { AppIntegrationRepository } from '@/integrations/types.js';
import { createLogger } from '@/observability/logger.js';
import { createSecurityCounters } from '@/observability/security-counters.js';
import { createKeyRing } from '@/secrets/key-ring.js';
import { createLoggingDispatcher } from '@/webhooks/dispatcher.js';
import { createSignatureVerifiers } from '@/webhooks/signature-verifiers.js';
import { createWebhookReceiver } from '@/webhooks/webhook-receiver.js';
import { createWebhookSecretGuard } from '@/webhooks/webhook-secret-guard.js';

const logger = createLogger();

async function loadConfig(): Promise<GatewayConfig> {
  const configPath = process.env['GATEWAY_CONFIG_PATH'];
  const result = configPath
    ? await loadGatewayConfig(configPath)
    : loadGatewayConfigFromEnv();

  if (!result.ok) {
    throw new StartupConfigurationError(result.error.message, {
      source: configPath ?? 'environment',
      ...result.error.context,
    });
  }
  return result.value;
}

async function start(): Promise<void> {
  try {
    const config = await loadConfig();

    // Key ring
    const keyRing = createKeyRing(config.encryption);
    logger.info('Key ring loaded', {
      component: 'main',
      activeKeyId: keyRing.activeKeyId,
      keyCount: keyRing.keyIds().length,
    });

    // Persistence
    let db: Database | undefined;
    let repository: AppIntegrationRepository;
    if (config.database) {
      db = createDatabase({ url: config.database.url });
      await db.ensureSchema();
      repository = createAppIntegrationRepository(db.client);
    } else {
      logger.warn('DATABASE_URL not set; integrations are kept in memory and lost on restart', {
        component: 'main',
      });
      repository = createInMemoryAppIntegrationRepository();
    }

    const counters = createSecurityCounters();
    const integrationStore = createIntegrationSecretStore({
      repository,
      keyRing,
      logger,
      counters,
    });

    const webhookReceiver = createWebhookReceiver({
      guard: createWebhookSecretGuard({ store: integrationStore, logger, counters }),
      verifiers: createSignatureVerifiers({
        slackToleranceSeconds: config.webhooks.slackTimestampToleranceSeconds,
        logger,
      }),
      dispatcher: createLoggingDispatcher(logger),
      logger,
      counters,
    });

    const server = await createServer({
      integrationStore,
      webhookReceiver,
      counters,
      publicBaseUrl: config.server.publicBaseUrl,
      logger,
    });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      if (db) {
        await db.disconnect();
      }
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    const { port, host } = config.server;
    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
      ...(err instanceof StartupConfigurationError && { context: err.context }),
    });
    process.exit(1);
  }
}

void start();
