// Core module: shared errors, result type, branded ids
export type { IntegrationId, KeyId, TenantId } from './types.js';
export { toIntegrationId, toKeyId, toTenantId } from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  GatewayError,
  StartupConfigurationError,
  KeyNotFoundError,
  InvalidCiphertextError,
  WebhookSecretMismatchError,
  ValidationError,
  IntegrationNotFoundError,
  DuplicateIntegrationError,
  SecretsUnavailableError,
} from './errors.js';
