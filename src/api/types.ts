import type { GatewayConfig } from '@/config/types.js';
import type { IntegrationSecretStore } from '@/integrations/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import type { WebhookReceiver } from '@/webhooks/webhook-receiver.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  /** Encrypting store for tenant integrations. */
  integrationStore: IntegrationSecretStore;
  /** Guard, signature check and dispatch for inbound webhooks. */
  webhookReceiver: WebhookReceiver;
  counters: SecurityCounters;
  /** Prefixed to webhook URLs handed back to tenants. */
  publicBaseUrl?: GatewayConfig['server']['publicBaseUrl'];
  logger: Logger;
}
