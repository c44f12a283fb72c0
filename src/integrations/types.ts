import type { IntegrationId, TenantId } from '@/core/types.js';
import type { SecretBundle } from '@/secrets/types.js';

import type { PlatformId } from './platforms.js';

// ─── Persisted Record ───────────────────────────────────────────

/**
 * An integration exactly as stored. Holds no plaintext credentials;
 * `secretsEncrypted` is the serialized blob or null when nothing was ever encrypted.
 */
export interface AppIntegrationRecord {
  id: IntegrationId;
  tenantId: TenantId;
  platformId: PlatformId;
  name: string;
  description?: string;
  configuration: Record<string, unknown>;
  secretsEncrypted: string | null;
  isEnabled: boolean;
  createdBy: string;
  updatedBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Outcome of decrypting a record's blob on read. */
export type SecretsStatus = 'ok' | 'none' | 'key_not_found' | 'invalid_ciphertext';

/**
 * An integration with its credentials decrypted for the current request.
 * `secrets` is empty when `secretsStatus` is not `ok`.
 */
export interface AppIntegration extends AppIntegrationRecord {
  secrets: SecretBundle;
  secretsStatus: SecretsStatus;
}

// ─── Repository ─────────────────────────────────────────────────

export interface NewAppIntegrationRecord {
  tenantId: TenantId;
  platformId: PlatformId;
  name: string;
  description?: string;
  configuration: Record<string, unknown>;
  secretsEncrypted: string;
  isEnabled: boolean;
  createdBy: string;
}

/** Fields written by one update. `configuration` and `secretsEncrypted` travel together. */
export interface AppIntegrationRecordUpdate {
  name?: string;
  description?: string;
  configuration: Record<string, unknown>;
  secretsEncrypted: string;
  isEnabled?: boolean;
  updatedBy: string;
}

export interface AppIntegrationFilter {
  tenantId?: TenantId;
  platformId?: PlatformId;
  isEnabled?: boolean;
}

/**
 * Plain CRUD over stored integrations. Knows nothing about encryption.
 */
export interface AppIntegrationRepository {
  create(record: NewAppIntegrationRecord): Promise<AppIntegrationRecord>;
  findById(id: IntegrationId): Promise<AppIntegrationRecord | null>;
  findAll(filter: AppIntegrationFilter): Promise<AppIntegrationRecord[]>;
  /** Returns null when no record with that id belongs to the tenant. */
  update(
    id: IntegrationId,
    tenantId: TenantId,
    changes: AppIntegrationRecordUpdate,
  ): Promise<AppIntegrationRecord | null>;
  delete(id: IntegrationId, tenantId: TenantId): Promise<boolean>;
  existsByName(tenantId: TenantId, name: string, excludeId?: IntegrationId): Promise<boolean>;
}

// ─── Store Inputs ───────────────────────────────────────────────

export interface CreateIntegrationInput {
  tenantId: TenantId;
  /** Canonical id or alias (`teams`, `generic`). */
  platformId: string;
  name: string;
  description?: string;
  /** May still carry secret fields in the legacy shape; they are moved into the bundle. */
  configuration?: Record<string, unknown>;
  secrets?: Record<string, string>;
  isEnabled?: boolean;
  createdBy: string;
}

/**
 * Partial update. Configuration and secrets are merged per key; a `null` value
 * removes the key. `webhookSecret` is kept unless a replacement is supplied.
 */
export interface UpdateIntegrationInput {
  name?: string;
  description?: string;
  configuration?: Record<string, unknown>;
  secrets?: Record<string, string | null>;
  isEnabled?: boolean;
  updatedBy: string;
}

// ─── Store ──────────────────────────────────────────────────────

/**
 * Decorates an AppIntegrationRepository: encrypts credentials on write and
 * decrypts them on read. Plaintext never reaches the repository.
 */
export interface IntegrationSecretStore {
  create(input: CreateIntegrationInput): Promise<AppIntegration>;
  update(
    tenantId: TenantId,
    id: IntegrationId,
    input: UpdateIntegrationInput,
  ): Promise<AppIntegration>;
  /** Replace the webhook secret with a freshly generated one. */
  rotateWebhookSecret(
    tenantId: TenantId,
    id: IntegrationId,
    updatedBy: string,
  ): Promise<AppIntegration>;
  /** Unscoped lookup used by inbound webhooks, whose URLs carry no tenant. */
  getById(id: IntegrationId): Promise<AppIntegration | null>;
  getForTenant(tenantId: TenantId, id: IntegrationId): Promise<AppIntegration | null>;
  getAll(filter: AppIntegrationFilter): Promise<AppIntegration[]>;
  delete(tenantId: TenantId, id: IntegrationId): Promise<boolean>;
}
