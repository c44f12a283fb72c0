/**
 * Secrets module: key ring, bundle encryption, masking and legacy migration.
 * @module secrets
 */
export type {
  EncryptedBlob,
  ExtractedSecrets,
  KeyRing,
  KeyRingEntry,
  MaskedSecretBundle,
  SecretBundle,
} from './types.js';
export { createKeyRing } from './key-ring.js';
export { AUTH_TAG_LENGTH, IV_LENGTH, KEY_LENGTH, generateKeyMaterial } from './crypto.js';
export {
  decryptSecretBundle,
  encryptSecretBundle,
  openSecretBundle,
  parseEncryptedBlob,
  sealSecretBundle,
  serializeEncryptedBlob,
} from './secret-cipher.js';
export type { SecretDecryptionError } from './secret-cipher.js';
export { SECRET_MASK, maskSecretBundle, maskSecretValue } from './secret-masker.js';
export { LEGACY_SECRET_FIELDS, extractLegacySecrets, hasLegacySecrets } from './legacy-migrator.js';
export {
  WEBHOOK_SECRET_FIELD,
  WEBHOOK_SECRET_LENGTH,
  assertValidWebhookSecret,
  generateWebhookSecret,
  isValidWebhookSecret,
} from './webhook-secret.js';
