// Inbound webhook pipeline
export type {
  GuardResult,
  InboundDispatcher,
  InboundWebhook,
  InboundWebhookEvent,
  InboundWebhookRequest,
  SignatureVerifier,
  SignatureVerifiers,
  VerificationResult,
  WebhookHeaders,
  WebhookOutcome,
  WebhookSecretGuard,
} from './types.js';
export { createWebhookSecretGuard } from './webhook-secret-guard.js';
export {
  computeGenericSignature,
  computeSlackSignature,
  createGenericSignatureVerifier,
  createPassthroughVerifier,
  createSignatureVerifiers,
  createSlackSignatureVerifier,
  headerValue,
  safeCompare,
} from './signature-verifiers.js';
export { createLoggingDispatcher } from './dispatcher.js';
export { parseWebhookPayload } from './payload.js';
export { createWebhookReceiver } from './webhook-receiver.js';
export type { WebhookReceiver, WebhookReceiverDeps } from './webhook-receiver.js';
