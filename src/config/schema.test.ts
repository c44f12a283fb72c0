import { describe, expect, it } from 'vitest';

import {
  encryptionConfigSchema,
  encryptionKeyEntrySchema,
  gatewayConfigSchema,
  serverConfigSchema,
  webhookConfigSchema,
} from './schema.js';

// ─── Test Fixtures ──────────────────────────────────────────────

const KEY = Buffer.alloc(32, 7).toString('base64');

const validEncryptionConfig = {
  activeKeyId: 'k1',
  keys: [{ id: 'k1', key: KEY }],
};

// ─── encryptionKeyEntrySchema ───────────────────────────────────

describe('encryptionKeyEntrySchema', () => {
  it('accepts ids of letters, digits, dash and underscore', () => {
    expect(encryptionKeyEntrySchema.safeParse({ id: 'key_2024-01', key: KEY }).success).toBe(true);
  });

  it('rejects ids containing the blob separator', () => {
    expect(encryptionKeyEntrySchema.safeParse({ id: 'k:1', key: KEY }).success).toBe(false);
  });

  it('rejects ids longer than 64 characters', () => {
    expect(encryptionKeyEntrySchema.safeParse({ id: 'a'.repeat(65), key: KEY }).success).toBe(false);
  });

  it('rejects empty key material', () => {
    expect(encryptionKeyEntrySchema.safeParse({ id: 'k1', key: '' }).success).toBe(false);
  });
});

// ─── encryptionConfigSchema ─────────────────────────────────────

describe('encryptionConfigSchema', () => {
  it('accepts a valid encryption section', () => {
    expect(encryptionConfigSchema.safeParse(validEncryptionConfig).success).toBe(true);
  });

  it('requires at least one key', () => {
    const result = encryptionConfigSchema.safeParse({ activeKeyId: 'k1', keys: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('At least one encryption key is required');
    }
  });

  it('requires an active key id', () => {
    expect(encryptionConfigSchema.safeParse({ keys: validEncryptionConfig.keys }).success).toBe(
      false,
    );
  });
});

// ─── serverConfigSchema ─────────────────────────────────────────

describe('serverConfigSchema', () => {
  it('applies defaults', () => {
    expect(serverConfigSchema.parse({})).toEqual({ port: 3000, host: '0.0.0.0' });
  });

  it('rejects out-of-range ports', () => {
    expect(serverConfigSchema.safeParse({ port: 0 }).success).toBe(false);
    expect(serverConfigSchema.safeParse({ port: 70000 }).success).toBe(false);
  });

  it('rejects a malformed public base URL', () => {
    expect(serverConfigSchema.safeParse({ publicBaseUrl: 'not a url' }).success).toBe(false);
  });
});

// ─── webhookConfigSchema ────────────────────────────────────────

describe('webhookConfigSchema', () => {
  it('defaults the Slack timestamp tolerance to five minutes', () => {
    expect(webhookConfigSchema.parse({})).toEqual({ slackTimestampToleranceSeconds: 300 });
  });

  it('rejects a non-positive tolerance', () => {
    expect(webhookConfigSchema.safeParse({ slackTimestampToleranceSeconds: 0 }).success).toBe(false);
  });
});

// ─── gatewayConfigSchema ────────────────────────────────────────

describe('gatewayConfigSchema', () => {
  it('fills in server and webhook sections', () => {
    const config = gatewayConfigSchema.parse({ encryption: validEncryptionConfig });

    expect(config.server.port).toBe(3000);
    expect(config.webhooks.slackTimestampToleranceSeconds).toBe(300);
    expect(config.database).toBeUndefined();
  });

  it('requires the encryption section', () => {
    expect(gatewayConfigSchema.safeParse({}).success).toBe(false);
  });

  it('accepts a database section', () => {
    const config = gatewayConfigSchema.parse({
      encryption: validEncryptionConfig,
      database: { url: 'postgres://localhost/gateway' },
    });
    expect(config.database?.url).toBe('postgres://localhost/gateway');
  });
});
