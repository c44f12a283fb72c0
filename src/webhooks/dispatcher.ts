/**
 * Default InboundDispatcher: records accepted deliveries in the log.
 * Deployments that process events downstream supply their own dispatcher.
 */
import type { Logger } from '@/observability/logger.js';

import type { InboundDispatcher, InboundWebhookEvent } from './types.js';

export function createLoggingDispatcher(logger: Logger): InboundDispatcher {
  return {
    dispatch(event: InboundWebhookEvent): Promise<void> {
      logger.info('Inbound webhook accepted', {
        component: 'inbound-dispatcher',
        tenantId: event.tenantId,
        integrationId: event.integrationId,
        platformId: event.platformId,
        contentType: event.contentType,
      });
      return Promise.resolve();
    },
  };
}
