/**
 * Platform signature verifiers, run after the webhook secret guard accepts.
 */
import { createHmac, timingSafeEqual } from 'node:crypto';

import type { Logger } from '@/observability/logger.js';

import type {
  InboundWebhook,
  SignatureVerifier,
  SignatureVerifiers,
  VerificationResult,
  WebhookHeaders,
} from './types.js';

const SLACK_SIGNATURE_HEADER = 'x-slack-signature';
const SLACK_TIMESTAMP_HEADER = 'x-slack-request-timestamp';
const SLACK_SIGNATURE_VERSION = 'v0';
const GENERIC_SIGNATURE_HEADER = 'x-webhook-signature';

/** First value of a header, if present. */
export function headerValue(headers: WebhookHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Constant-time string comparison; unequal lengths fail without comparing. */
export function safeCompare(received: string, expected: string): boolean {
  const a = Buffer.from(received, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

function reject(reason: string): VerificationResult {
  return { ok: false, reason };
}

// ─── Slack ──────────────────────────────────────────────────────

/** `v0=` + hex HMAC-SHA256 of `v0:<timestamp>:<body>` keyed by the signing secret. */
export function computeSlackSignature(signingSecret: string, timestamp: string, body: Buffer): string {
  const hmac = createHmac('sha256', signingSecret);
  hmac.update(`${SLACK_SIGNATURE_VERSION}:${timestamp}:`);
  hmac.update(body);
  return `${SLACK_SIGNATURE_VERSION}=${hmac.digest('hex')}`;
}

export function createSlackSignatureVerifier(options: {
  toleranceSeconds: number;
  now?: () => Date;
}): SignatureVerifier {
  const now = options.now ?? ((): Date => new Date());

  return {
    verify(webhook: InboundWebhook): VerificationResult {
      const signingSecret = webhook.integration.secrets['signingSecret'];
      if (signingSecret === undefined) return reject('Integration has no signing secret');

      const signature = headerValue(webhook.headers, SLACK_SIGNATURE_HEADER);
      const timestamp = headerValue(webhook.headers, SLACK_TIMESTAMP_HEADER);
      if (signature === undefined || timestamp === undefined) {
        return reject('Missing Slack signature headers');
      }

      if (!/^\d+$/.test(timestamp)) return reject('Malformed Slack timestamp');
      const ageSeconds = Math.abs(Math.floor(now().getTime() / 1000) - Number(timestamp));
      if (ageSeconds > options.toleranceSeconds) return reject('Slack timestamp outside tolerance');

      const expected = computeSlackSignature(signingSecret, timestamp, webhook.rawBody);
      return safeCompare(signature, expected) ? { ok: true } : reject('Slack signature mismatch');
    },
  };
}

// ─── Generic Webhook ────────────────────────────────────────────

export function computeGenericSignature(secret: string, body: Buffer): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * HMAC-SHA256 over the raw body in `X-Webhook-Signature`, with or without a
 * `sha256=` prefix. Only enforced when the integration has a `secret` field.
 */
export function createGenericSignatureVerifier(): SignatureVerifier {
  return {
    verify(webhook: InboundWebhook): VerificationResult {
      const secret = webhook.integration.secrets['secret'];
      if (secret === undefined) return { ok: true };

      const header = headerValue(webhook.headers, GENERIC_SIGNATURE_HEADER);
      if (header === undefined) return reject('Missing webhook signature header');

      // Support both raw and prefixed signatures
      const signature = header.startsWith('sha256=') ? header.slice(7) : header;
      const expected = computeGenericSignature(secret, webhook.rawBody);
      return safeCompare(signature.toLowerCase(), expected)
        ? { ok: true }
        : reject('Webhook signature mismatch');
    },
  };
}

// ─── Externally Verified Platforms ──────────────────────────────

/**
 * Teams and Outlook deliveries are authenticated by their own SDK-level
 * token validation downstream; this layer only records that it passed them on.
 */
export function createPassthroughVerifier(platformId: string, logger: Logger): SignatureVerifier {
  return {
    verify(webhook: InboundWebhook): VerificationResult {
      logger.debug('No signature verification at this layer', {
        component: 'signature-verifier',
        platformId,
        integrationId: webhook.integration.id,
      });
      return { ok: true };
    },
  };
}

// ─── Registry ───────────────────────────────────────────────────

export function createSignatureVerifiers(options: {
  slackToleranceSeconds: number;
  logger: Logger;
  now?: () => Date;
}): SignatureVerifiers {
  return {
    slack: createSlackSignatureVerifier({
      toleranceSeconds: options.slackToleranceSeconds,
      now: options.now,
    }),
    msteams: createPassthroughVerifier('msteams', options.logger),
    outlook: createPassthroughVerifier('outlook', options.logger),
    webhook: createGenericSignatureVerifier(),
  };
}
