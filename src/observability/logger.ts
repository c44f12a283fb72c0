import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for the gateway. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

const SECRET_FIELDS = [
  'secret',
  'secrets',
  'webhookSecret',
  'signingSecret',
  'botToken',
  'incomingWebhookUrl',
  'appPassword',
  'clientSecret',
  'secretsEncrypted',
  'key',
  'authorization',
  'password',
];

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'integration-secrets-gateway',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [...SECRET_FIELDS, ...SECRET_FIELDS.map((field) => `*.${field}`)],
      censor: '[REDACTED]',
    },
  });

  return wrapPino(pinoInstance);
}

/**
 * Adapt pino's (object, message) call order to the gateway's (message, context) order.
 */
function wrapPino(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}
