/**
 * IntegrationSecretStore: encrypts integration credentials on write and
 * decrypts them on read, on top of a plain AppIntegrationRepository.
 *
 * Decryption failures never fail a read: the integration comes back with an
 * empty bundle and a `secretsStatus` saying why. Writes over such a record are
 * refused so the stored blob survives until its key is restored.
 */
import {
  DuplicateIntegrationError,
  IntegrationNotFoundError,
  KeyNotFoundError,
  SecretsUnavailableError,
  ValidationError,
} from '@/core/errors.js';
import type { IntegrationId, TenantId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SecurityCounters } from '@/observability/security-counters.js';
import { extractLegacySecrets, hasLegacySecrets } from '@/secrets/legacy-migrator.js';
import { openSecretBundle, sealSecretBundle } from '@/secrets/secret-cipher.js';
import type { KeyRing, SecretBundle } from '@/secrets/types.js';
import {
  WEBHOOK_SECRET_FIELD,
  assertValidWebhookSecret,
  generateWebhookSecret,
} from '@/secrets/webhook-secret.js';

import { REQUIRED_FIELDS, normalizePlatformId } from './platforms.js';
import type { PlatformId } from './platforms.js';
import type {
  AppIntegration,
  AppIntegrationFilter,
  AppIntegrationRecord,
  AppIntegrationRepository,
  CreateIntegrationInput,
  IntegrationSecretStore,
  SecretsStatus,
  UpdateIntegrationInput,
} from './types.js';

interface IntegrationSecretStoreDeps {
  repository: AppIntegrationRepository;
  keyRing: KeyRing;
  logger: Logger;
  counters: SecurityCounters;
}

interface RevealedSecrets {
  secrets: SecretBundle;
  secretsStatus: SecretsStatus;
}

// ─── Helpers ────────────────────────────────────────────────────

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/** Apply a per-key patch where `null` deletes the key. */
function mergeConfiguration(
  current: Readonly<Record<string, unknown>>,
  patch: Readonly<Record<string, unknown>> | undefined,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...current };
  if (patch === undefined) return merged;
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/** Drop every key that now lives in the bundle, so no secret stays in plain configuration. */
function withoutSecretFields(
  configuration: Readonly<Record<string, unknown>>,
  secrets: SecretBundle,
): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(configuration)) {
    if (!Object.hasOwn(secrets, key)) cleaned[key] = value;
  }
  return cleaned;
}

function assertRequiredFields(
  platformId: PlatformId,
  configuration: Readonly<Record<string, unknown>>,
  secrets: SecretBundle,
): void {
  const missing = REQUIRED_FIELDS[platformId].filter(
    (field) => !isPresent(configuration[field]) && !isPresent(secrets[field]),
  );
  if (missing.length > 0) {
    throw new ValidationError(
      `Missing required configuration fields for ${platformId}: ${missing.join(', ')}`,
      { platformId, missing },
    );
  }
}

function requireName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new ValidationError('Integration name cannot be empty');
  }
  return trimmed;
}

// ─── Store Factory ──────────────────────────────────────────────

/**
 * Create an IntegrationSecretStore over the given repository and key ring.
 */
export function createIntegrationSecretStore(
  deps: IntegrationSecretStoreDeps,
): IntegrationSecretStore {
  const { repository, keyRing, counters } = deps;
  const logger = deps.logger.child({ component: 'integration-secret-store' });

  function reveal(record: AppIntegrationRecord): RevealedSecrets {
    if (record.secretsEncrypted === null || record.secretsEncrypted === '') {
      return { secrets: {}, secretsStatus: 'none' };
    }

    const result = openSecretBundle(record.secretsEncrypted, keyRing);
    if (result.ok) {
      return { secrets: result.value, secretsStatus: 'ok' };
    }

    if (result.error instanceof KeyNotFoundError) {
      counters.increment('decrypt_key_not_found');
      logger.warn('Integration secrets reference a key that is not in the key ring', {
        component: 'integration-secret-store',
        tenantId: record.tenantId,
        integrationId: record.id,
        keyId: result.error.keyId,
      });
      return { secrets: {}, secretsStatus: 'key_not_found' };
    }

    counters.increment('decrypt_invalid_ciphertext');
    logger.error('Integration secrets failed authentication', {
      component: 'integration-secret-store',
      tenantId: record.tenantId,
      integrationId: record.id,
      keyId: result.error.keyId,
      reason: result.error.message,
    });
    return { secrets: {}, secretsStatus: 'invalid_ciphertext' };
  }

  function toIntegration(record: AppIntegrationRecord, revealed: RevealedSecrets): AppIntegration {
    return { ...record, ...revealed };
  }

  /**
   * Merge bundles and make sure a webhook secret exists.
   * `explicit` wins over `migrated`, which wins over `current`.
   * A stored webhook secret is kept as-is; only caller-supplied ones are validated.
   */
  function buildBundle(
    current: SecretBundle,
    migrated: SecretBundle,
    explicit: Readonly<Record<string, string | null>> | undefined,
  ): Record<string, string> {
    const bundle: Record<string, string> = { ...current, ...migrated };

    for (const [field, value] of Object.entries(explicit ?? {})) {
      if (field === WEBHOOK_SECRET_FIELD) {
        if (value === null) {
          throw new ValidationError('webhookSecret cannot be removed; rotate it instead', {
            field,
          });
        }
        assertValidWebhookSecret(value);
      }
      if (value === null || value === '') {
        delete bundle[field];
      } else {
        bundle[field] = value;
      }
    }

    if (bundle[WEBHOOK_SECRET_FIELD] === undefined) {
      bundle[WEBHOOK_SECRET_FIELD] = generateWebhookSecret();
    }
    return bundle;
  }

  async function findOwned(tenantId: TenantId, id: IntegrationId): Promise<AppIntegrationRecord> {
    const record = await repository.findById(id);
    if (record === null || record.tenantId !== tenantId) {
      throw new IntegrationNotFoundError(id);
    }
    return record;
  }

  /**
   * Shared write path for update and rotation. Undecryptable secrets are never
   * overwritten unless `allowReplacement` is set and the caller supplies a webhook secret.
   */
  async function applyUpdate(
    existing: AppIntegrationRecord,
    input: UpdateIntegrationInput,
    allowReplacement: boolean,
  ): Promise<AppIntegration> {
    let name: string | undefined;
    if (input.name !== undefined) {
      name = requireName(input.name);
      if (
        name !== existing.name &&
        (await repository.existsByName(existing.tenantId, name, existing.id))
      ) {
        throw new DuplicateIntegrationError(existing.tenantId, name);
      }
    }

    const current = reveal(existing);
    if (current.secretsStatus === 'key_not_found' || current.secretsStatus === 'invalid_ciphertext') {
      const context = {
        component: 'integration-secret-store',
        tenantId: existing.tenantId,
        integrationId: existing.id,
        secretsStatus: current.secretsStatus,
      };
      // Only an explicit replacement bundle carrying its own webhook secret may overwrite the blob
      const replacement = input.secrets?.[WEBHOOK_SECRET_FIELD];
      if (!allowReplacement || typeof replacement !== 'string') {
        logger.warn('Refusing to overwrite secrets that cannot be decrypted', context);
        throw new SecretsUnavailableError(existing.id, current.secretsStatus);
      }
      logger.warn('Replacing integration secrets that cannot be decrypted', context);
    }

    const mergedConfiguration = mergeConfiguration(existing.configuration, input.configuration);
    if (hasLegacySecrets(existing.platformId, mergedConfiguration)) {
      logger.info('Moving legacy secret fields out of configuration', {
        component: 'integration-secret-store',
        tenantId: existing.tenantId,
        integrationId: existing.id,
        platformId: existing.platformId,
      });
    }
    const extracted = extractLegacySecrets(existing.platformId, mergedConfiguration);
    const secrets = buildBundle(current.secrets, extracted.secrets, input.secrets);
    const configuration = withoutSecretFields(extracted.configuration, secrets);
    assertRequiredFields(existing.platformId, configuration, secrets);

    const updated = await repository.update(existing.id, existing.tenantId, {
      name,
      description: input.description,
      configuration,
      secretsEncrypted: sealSecretBundle(secrets, keyRing),
      isEnabled: input.isEnabled,
      updatedBy: input.updatedBy,
    });
    if (updated === null) {
      throw new IntegrationNotFoundError(existing.id);
    }

    return toIntegration(updated, { secrets, secretsStatus: 'ok' });
  }

  return {
    async create(input: CreateIntegrationInput): Promise<AppIntegration> {
      const platformId = normalizePlatformId(input.platformId);
      if (platformId === undefined) {
        throw new ValidationError(`Unsupported platform: ${input.platformId}`, {
          platform: input.platformId,
        });
      }

      const name = requireName(input.name);
      if (await repository.existsByName(input.tenantId, name)) {
        throw new DuplicateIntegrationError(input.tenantId, name);
      }

      const extracted = extractLegacySecrets(platformId, input.configuration ?? {});
      const secrets = buildBundle({}, extracted.secrets, input.secrets);
      const configuration = withoutSecretFields(extracted.configuration, secrets);
      assertRequiredFields(platformId, configuration, secrets);

      const record = await repository.create({
        tenantId: input.tenantId,
        platformId,
        name,
        description: input.description,
        configuration,
        secretsEncrypted: sealSecretBundle(secrets, keyRing),
        isEnabled: input.isEnabled ?? true,
        createdBy: input.createdBy,
      });

      logger.info('Integration created', {
        component: 'integration-secret-store',
        tenantId: record.tenantId,
        integrationId: record.id,
        platformId,
        keyId: keyRing.activeKeyId,
      });

      return toIntegration(record, { secrets, secretsStatus: 'ok' });
    },

    async update(
      tenantId: TenantId,
      id: IntegrationId,
      input: UpdateIntegrationInput,
    ): Promise<AppIntegration> {
      const existing = await findOwned(tenantId, id);
      return applyUpdate(existing, input, true);
    },

    async rotateWebhookSecret(
      tenantId: TenantId,
      id: IntegrationId,
      updatedBy: string,
    ): Promise<AppIntegration> {
      const existing = await findOwned(tenantId, id);
      const rotated = await applyUpdate(
        existing,
        { secrets: { [WEBHOOK_SECRET_FIELD]: generateWebhookSecret() }, updatedBy },
        false,
      );

      logger.info('Webhook secret rotated', {
        component: 'integration-secret-store',
        tenantId,
        integrationId: id,
      });
      return rotated;
    },

    async getById(id: IntegrationId): Promise<AppIntegration | null> {
      const record = await repository.findById(id);
      if (record === null) return null;
      return toIntegration(record, reveal(record));
    },

    async getForTenant(tenantId: TenantId, id: IntegrationId): Promise<AppIntegration | null> {
      const record = await repository.findById(id);
      if (record === null || record.tenantId !== tenantId) return null;
      return toIntegration(record, reveal(record));
    },

    async getAll(filter: AppIntegrationFilter): Promise<AppIntegration[]> {
      const records = await repository.findAll(filter);
      return records.map((record) => toIntegration(record, reveal(record)));
    },

    async delete(tenantId: TenantId, id: IntegrationId): Promise<boolean> {
      const deleted = await repository.delete(id, tenantId);
      if (deleted) {
        logger.info('Integration deleted', {
          component: 'integration-secret-store',
          tenantId,
          integrationId: id,
        });
      }
      return deleted;
    },
  };
}
