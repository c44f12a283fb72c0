/**
 * In-memory AppIntegrationRepository, used when no DATABASE_URL is configured
 * and by tests. Records are deep-copied on the way in and out.
 */
import { nanoid } from 'nanoid';

import type { IntegrationId, TenantId } from '@/core/types.js';
import { toIntegrationId } from '@/core/types.js';
import type {
  AppIntegrationFilter,
  AppIntegrationRecord,
  AppIntegrationRecordUpdate,
  AppIntegrationRepository,
  NewAppIntegrationRecord,
} from '@/integrations/types.js';

export interface InMemoryAppIntegrationRepository extends AppIntegrationRepository {
  /** Every stored record as persisted, for inspection in tests. */
  dump(): AppIntegrationRecord[];
}

export function createInMemoryAppIntegrationRepository(options?: {
  now?: () => Date;
}): InMemoryAppIntegrationRepository {
  const records = new Map<string, AppIntegrationRecord>();
  const now = options?.now ?? ((): Date => new Date());

  function matches(record: AppIntegrationRecord, filter: AppIntegrationFilter): boolean {
    if (filter.tenantId !== undefined && record.tenantId !== filter.tenantId) return false;
    if (filter.platformId !== undefined && record.platformId !== filter.platformId) return false;
    if (filter.isEnabled !== undefined && record.isEnabled !== filter.isEnabled) return false;
    return true;
  }

  return {
    create(input: NewAppIntegrationRecord): Promise<AppIntegrationRecord> {
      const timestamp = now();
      const record: AppIntegrationRecord = {
        id: toIntegrationId(nanoid()),
        ...structuredClone(input),
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      records.set(record.id, record);
      return Promise.resolve(structuredClone(record));
    },

    findById(id: IntegrationId): Promise<AppIntegrationRecord | null> {
      const record = records.get(id);
      return Promise.resolve(record ? structuredClone(record) : null);
    },

    findAll(filter: AppIntegrationFilter): Promise<AppIntegrationRecord[]> {
      const found = [...records.values()]
        .filter((record) => matches(record, filter))
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      return Promise.resolve(structuredClone(found));
    },

    update(
      id: IntegrationId,
      tenantId: TenantId,
      changes: AppIntegrationRecordUpdate,
    ): Promise<AppIntegrationRecord | null> {
      const existing = records.get(id);
      if (existing === undefined || existing.tenantId !== tenantId) return Promise.resolve(null);

      const updated: AppIntegrationRecord = {
        ...existing,
        ...(changes.name !== undefined && { name: changes.name }),
        ...(changes.description !== undefined && { description: changes.description }),
        ...(changes.isEnabled !== undefined && { isEnabled: changes.isEnabled }),
        configuration: structuredClone(changes.configuration),
        secretsEncrypted: changes.secretsEncrypted,
        updatedBy: changes.updatedBy,
        updatedAt: now(),
      };
      records.set(id, updated);
      return Promise.resolve(structuredClone(updated));
    },

    delete(id: IntegrationId, tenantId: TenantId): Promise<boolean> {
      const existing = records.get(id);
      if (existing === undefined || existing.tenantId !== tenantId) return Promise.resolve(false);
      records.delete(id);
      return Promise.resolve(true);
    },

    existsByName(tenantId: TenantId, name: string, excludeId?: IntegrationId): Promise<boolean> {
      const taken = [...records.values()].some(
        (record) => record.tenantId === tenantId && record.name === name && record.id !== excludeId,
      );
      return Promise.resolve(taken);
    },

    dump(): AppIntegrationRecord[] {
      return structuredClone([...records.values()]);
    },
  };
}
