/**
 * Zod schemas for validating the gateway configuration file.
 * Semantic key checks (32-byte length, active id present) live in the key ring,
 * which raises StartupConfigurationError; these schemas only check shape.
 */
import { z } from 'zod';

/** Key ids prefix serialized blobs, so they must not contain the separator. */
export const KEY_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// ─── Encryption Config ──────────────────────────────────────────

/** Schema for one key ring entry: an id and the base64 encoding of 32 random bytes. */
export const encryptionKeyEntrySchema = z.object({
  id: z.string().regex(KEY_ID_PATTERN, 'Key id must be 1-64 characters of [A-Za-z0-9_-]'),
  key: z.string().min(1, 'Key material cannot be empty'),
});

/** Schema for the encryption section: one active id and every key still needed for decryption. */
export const encryptionConfigSchema = z.object({
  activeKeyId: z.string().regex(KEY_ID_PATTERN, 'Active key id must be 1-64 characters of [A-Za-z0-9_-]'),
  keys: z.array(encryptionKeyEntrySchema).min(1, 'At least one encryption key is required'),
});

// ─── Server Config ──────────────────────────────────────────────

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default('0.0.0.0'),
  /** Prefixed to webhook paths returned to tenants. */
  publicBaseUrl: z.string().url('Invalid public base URL').optional(),
});

// ─── Webhook Config ─────────────────────────────────────────────

export const webhookConfigSchema = z.object({
  slackTimestampToleranceSeconds: z.number().int().positive().default(300),
});

// ─── Database Config ────────────────────────────────────────────

export const databaseConfigSchema = z.object({
  url: z.string().min(1, 'Database URL cannot be empty'),
});

// ─── Gateway Config ─────────────────────────────────────────────

export const gatewayConfigSchema = z.object({
  server: serverConfigSchema.default({}),
  encryption: encryptionConfigSchema,
  webhooks: webhookConfigSchema.default({}),
  database: databaseConfigSchema.optional(),
});
