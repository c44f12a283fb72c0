import type { z } from 'zod';
import type {
  encryptionConfigSchema,
  encryptionKeyEntrySchema,
  gatewayConfigSchema,
  serverConfigSchema,
  webhookConfigSchema,
} from './schema.js';

// ─── Gateway Configuration ──────────────────────────────────────

/** Fully validated gateway configuration, defaults applied. */
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type WebhookConfig = z.infer<typeof webhookConfigSchema>;

/** Encryption section as written by operators (keys still base64). */
export type EncryptionConfig = z.infer<typeof encryptionConfigSchema>;
export type EncryptionKeyEntryConfig = z.infer<typeof encryptionKeyEntrySchema>;
