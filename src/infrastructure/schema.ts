/**
 * Drizzle table definitions.
 */
import { boolean, index, jsonb, pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';

export const appIntegrations = pgTable(
  'app_integrations',
  {
    id: text('id').primaryKey(),
    tenantId: text('tenant_id').notNull(),
    platformId: text('platform_id').notNull(),
    name: text('name').notNull(),
    description: text('description'),
    configuration: jsonb('configuration').$type<Record<string, unknown>>().notNull().default({}),
    /** `<keyId>:<base64>` blob; the only place credentials are stored. */
    secretsEncrypted: text('secrets_encrypted'),
    isEnabled: boolean('is_enabled').notNull().default(true),
    createdBy: text('created_by').notNull(),
    updatedBy: text('updated_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_app_integrations_tenant_name').on(table.tenantId, table.name),
    index('idx_app_integrations_tenant_platform').on(table.tenantId, table.platformId),
  ],
);

export type AppIntegrationRow = typeof appIntegrations.$inferSelect;
