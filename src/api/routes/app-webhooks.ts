/**
 * Inbound app webhook route.
 *
 * URL pattern: POST /webhooks/:platform/:integrationId/:webhookSecret
 *
 * Bodies are kept as raw bytes so platform signatures can be computed over
 * exactly what was sent; decoding happens only after the secret guard passes.
 * Unknown integrations, wrong secrets and platform mismatches all get the same
 * 404 body.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import type { WebhookOutcome } from '@/webhooks/types.js';

import { sendError } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';

const webhookParamsSchema = z.object({
  platform: z.string(),
  integrationId: z.string(),
  webhookSecret: z.string(),
});

async function sendOutcome(reply: FastifyReply, outcome: WebhookOutcome): Promise<void> {
  switch (outcome.kind) {
    case 'not_found':
      return sendError(reply, 'NOT_FOUND', 'Not found', 404);
    case 'disabled':
      return sendError(reply, 'INTEGRATION_DISABLED', 'Integration is disabled', 503);
    case 'unauthorized':
      return sendError(reply, 'UNAUTHORIZED', 'Signature verification failed', 401);
    case 'bad_request':
      return sendError(reply, 'BAD_REQUEST', outcome.message, 400);
    case 'challenge':
      await reply.status(200).send({ challenge: outcome.challenge });
      return;
    case 'accepted':
      await reply.status(200).send({ ok: true });
      return;
  }
}

// ─── Route Registration ─────────────────────────────────────────

/** Register the inbound webhook route. Must be registered as its own plugin so the raw-body parser stays scoped to it. */
export async function appWebhookRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { webhookReceiver } = deps;

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post('/webhooks/:platform/:integrationId/:webhookSecret', async (request, reply) => {
    const params = webhookParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendError(reply, 'NOT_FOUND', 'Not found', 404);
    }

    const outcome = await webhookReceiver.receive({
      ...params.data,
      headers: request.headers,
      rawBody: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
    });

    return sendOutcome(reply, outcome);
  });
}
