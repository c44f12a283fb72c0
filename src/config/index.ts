// ─── Types ──────────────────────────────────────────────────────
export type {
  EncryptionConfig,
  EncryptionKeyEntryConfig,
  GatewayConfig,
  ServerConfig,
  WebhookConfig,
} from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  KEY_ID_PATTERN,
  databaseConfigSchema,
  encryptionConfigSchema,
  encryptionKeyEntrySchema,
  gatewayConfigSchema,
  serverConfigSchema,
  webhookConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  loadGatewayConfig,
  loadGatewayConfigFromEnv,
  parseKeyList,
  resolveEnvVars,
} from './loader.js';
