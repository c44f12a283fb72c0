import type { WebhookSecretMismatchError } from '@/core/errors.js';
import type { IntegrationId, TenantId } from '@/core/types.js';
import type { PlatformId } from '@/integrations/platforms.js';
import type { AppIntegration } from '@/integrations/types.js';

// ─── Inbound Request ────────────────────────────────────────────

/** Header map as Node delivers it: lowercase names, repeated headers as arrays. */
export type WebhookHeaders = Readonly<Record<string, string | string[] | undefined>>;

/** An inbound delivery after the webhook secret has been accepted. */
export interface InboundWebhook {
  integration: AppIntegration;
  headers: WebhookHeaders;
  /** Exact bytes received; signatures are computed over these. */
  rawBody: Buffer;
  receivedAt: Date;
}

// ─── Secret Guard ───────────────────────────────────────────────

export type GuardResult =
  | { ok: true; integration: AppIntegration }
  | { ok: false; error: WebhookSecretMismatchError };

/**
 * First check on every inbound webhook: the secret in the URL must match the
 * integration's stored webhook secret. Unknown ids and wrong secrets are
 * indistinguishable to the caller.
 */
export interface WebhookSecretGuard {
  validate(integrationId: string, suppliedSecret: string): Promise<GuardResult>;
}

// ─── Signature Verification ─────────────────────────────────────

export type VerificationResult = { ok: true } | { ok: false; reason: string };

/** Platform-specific second check, run only after the guard accepts. */
export interface SignatureVerifier {
  verify(webhook: InboundWebhook): VerificationResult;
}

export type SignatureVerifiers = Readonly<Record<PlatformId, SignatureVerifier>>;

// ─── Dispatch ───────────────────────────────────────────────────

/** A verified delivery ready for processing. Carries no credentials. */
export interface InboundWebhookEvent {
  tenantId: TenantId;
  integrationId: IntegrationId;
  platformId: PlatformId;
  contentType?: string;
  payload: unknown;
  receivedAt: Date;
}

/** Hands verified deliveries to whatever processes them. */
export interface InboundDispatcher {
  dispatch(event: InboundWebhookEvent): Promise<void>;
}

// ─── Receiver ───────────────────────────────────────────────────

export interface InboundWebhookRequest {
  platform: string;
  integrationId: string;
  webhookSecret: string;
  headers: WebhookHeaders;
  rawBody: Buffer;
}

/** How the HTTP layer should answer an inbound delivery. */
export type WebhookOutcome =
  | { kind: 'not_found' }
  | { kind: 'disabled' }
  | { kind: 'unauthorized' }
  | { kind: 'bad_request'; message: string }
  | { kind: 'challenge'; challenge: string }
  | { kind: 'accepted' };
