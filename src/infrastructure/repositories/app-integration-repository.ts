/**
 * App integration repository: Postgres CRUD via Drizzle.
 * Stores whatever blob it is handed; encryption happens in IntegrationSecretStore.
 */
import { and, desc, eq, ne } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { nanoid } from 'nanoid';
import postgres from 'postgres';

import { DuplicateIntegrationError } from '@/core/errors.js';
import type { IntegrationId, TenantId } from '@/core/types.js';
import { toIntegrationId, toTenantId } from '@/core/types.js';
import { normalizePlatformId } from '@/integrations/platforms.js';
import { createLogger } from '@/observability/logger.js';
import type {
  AppIntegrationFilter,
  AppIntegrationRecord,
  AppIntegrationRecordUpdate,
  AppIntegrationRepository,
  NewAppIntegrationRecord,
} from '@/integrations/types.js';

import type { GatewayDatabase } from '../database.js';
import { appIntegrations } from '../schema.js';
import type { AppIntegrationRow } from '../schema.js';

const UNIQUE_VIOLATION = '23505';

const logger = createLogger({ name: 'app-integration-repository' });

// ─── Mapper ─────────────────────────────────────────────────────

export function toAppIntegrationRecord(row: AppIntegrationRow): AppIntegrationRecord {
  const platformId = normalizePlatformId(row.platformId);
  if (platformId === undefined) {
    throw new Error(`Stored integration "${row.id}" has unknown platform "${row.platformId}"`);
  }
  return {
    id: toIntegrationId(row.id),
    tenantId: toTenantId(row.tenantId),
    platformId,
    name: row.name,
    description: row.description ?? undefined,
    configuration: row.configuration,
    secretsEncrypted: row.secretsEncrypted,
    isEnabled: row.isEnabled,
    createdBy: row.createdBy,
    updatedBy: row.updatedBy ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Map rows for reads. A row whose platform is no longer known is skipped with a
 * warning so one bad row cannot fail a whole listing.
 */
export function toReadableRecords(rows: readonly AppIntegrationRow[]): AppIntegrationRecord[] {
  const records: AppIntegrationRecord[] = [];
  for (const row of rows) {
    if (normalizePlatformId(row.platformId) === undefined) {
      logger.warn('Skipping stored integration with unknown platform', {
        component: 'app-integration-repository',
        tenantId: row.tenantId,
        integrationId: row.id,
        platformId: row.platformId,
      });
      continue;
    }
    records.push(toAppIntegrationRecord(row));
  }
  return records;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION;
}

// ─── Repository Factory ─────────────────────────────────────────

/**
 * Create an AppIntegrationRepository backed by Postgres.
 */
export function createAppIntegrationRepository(db: GatewayDatabase): AppIntegrationRepository {
  return {
    async create(input: NewAppIntegrationRecord): Promise<AppIntegrationRecord> {
      try {
        const [row] = await db
          .insert(appIntegrations)
          .values({
            id: nanoid(),
            tenantId: input.tenantId,
            platformId: input.platformId,
            name: input.name,
            description: input.description ?? null,
            configuration: input.configuration,
            secretsEncrypted: input.secretsEncrypted,
            isEnabled: input.isEnabled,
            createdBy: input.createdBy,
          })
          .returning();
        if (!row) throw new Error('Insert into app_integrations returned no row');
        return toAppIntegrationRecord(row);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new DuplicateIntegrationError(input.tenantId, input.name);
        }
        throw error;
      }
    },

    async findById(id: IntegrationId): Promise<AppIntegrationRecord | null> {
      const [row] = await db
        .select()
        .from(appIntegrations)
        .where(eq(appIntegrations.id, id))
        .limit(1);
      if (!row) return null;
      return toReadableRecords([row])[0] ?? null;
    },

    async findAll(filter: AppIntegrationFilter): Promise<AppIntegrationRecord[]> {
      const conditions: SQL[] = [];
      if (filter.tenantId !== undefined) conditions.push(eq(appIntegrations.tenantId, filter.tenantId));
      if (filter.platformId !== undefined) {
        conditions.push(eq(appIntegrations.platformId, filter.platformId));
      }
      if (filter.isEnabled !== undefined) {
        conditions.push(eq(appIntegrations.isEnabled, filter.isEnabled));
      }

      const rows = await db
        .select()
        .from(appIntegrations)
        .where(and(...conditions))
        .orderBy(desc(appIntegrations.createdAt));
      return toReadableRecords(rows);
    },

    async update(
      id: IntegrationId,
      tenantId: TenantId,
      changes: AppIntegrationRecordUpdate,
    ): Promise<AppIntegrationRecord | null> {
      try {
        // configuration and blob go out in one statement
        const [row] = await db
          .update(appIntegrations)
          .set({
            ...(changes.name !== undefined && { name: changes.name }),
            ...(changes.description !== undefined && { description: changes.description }),
            ...(changes.isEnabled !== undefined && { isEnabled: changes.isEnabled }),
            configuration: changes.configuration,
            secretsEncrypted: changes.secretsEncrypted,
            updatedBy: changes.updatedBy,
            updatedAt: new Date(),
          })
          .where(and(eq(appIntegrations.id, id), eq(appIntegrations.tenantId, tenantId)))
          .returning();
        return row ? toAppIntegrationRecord(row) : null;
      } catch (error) {
        if (isUniqueViolation(error) && changes.name !== undefined) {
          throw new DuplicateIntegrationError(tenantId, changes.name);
        }
        throw error;
      }
    },

    async delete(id: IntegrationId, tenantId: TenantId): Promise<boolean> {
      const deleted = await db
        .delete(appIntegrations)
        .where(and(eq(appIntegrations.id, id), eq(appIntegrations.tenantId, tenantId)))
        .returning({ id: appIntegrations.id });
      return deleted.length > 0;
    },

    async existsByName(
      tenantId: TenantId,
      name: string,
      excludeId?: IntegrationId,
    ): Promise<boolean> {
      const conditions: SQL[] = [
        eq(appIntegrations.tenantId, tenantId),
        eq(appIntegrations.name, name),
      ];
      if (excludeId !== undefined) conditions.push(ne(appIntegrations.id, excludeId));

      const rows = await db
        .select({ id: appIntegrations.id })
        .from(appIntegrations)
        .where(and(...conditions))
        .limit(1);
      return rows.length > 0;
    },
  };
}
