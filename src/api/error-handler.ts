/**
 * Global Fastify error handler and response helpers.
 * Maps GatewayError subclasses and ZodError to structured ApiResponse envelopes.
 */
import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';

import { GatewayError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';

import type { ApiResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

// ─── Response Helpers ───────────────────────────────────────────

/** Send a success response wrapped in the ApiResponse envelope. */
export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** Send an error response wrapped in the ApiResponse envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** Send a 404 not-found response. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler<FastifyError>(async (error, _request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const details: Record<string, unknown> = {
        issues: error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      };
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, details);
      return;
    }

    // GatewayError hierarchy: client errors carry their context, server errors do not
    if (error instanceof GatewayError) {
      if (error.statusCode >= 500) {
        logger.error('Request failed with GatewayError', {
          component: 'error-handler',
          code: error.code,
          statusCode: error.statusCode,
          message: error.message,
        });
        await sendError(reply, error.code, error.message, error.statusCode);
        return;
      }

      logger.warn('Request rejected', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify built-in errors (e.g., JSON parse failures, body too large, rate limit)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      await sendError(reply, 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    // Unknown errors
    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: error.message,
      stack: error.stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
