/**
 * Postgres client (postgres.js + Drizzle) with lifecycle management.
 */
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

import { createLogger } from '@/observability/logger.js';

import * as schema from './schema.js';

const logger = createLogger({ name: 'database' });

/** DDL matching `appIntegrations` in schema.ts, applied at startup. */
const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS app_integrations (
  id TEXT PRIMARY KEY,
  tenant_id TEXT NOT NULL,
  platform_id TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT,
  configuration JSONB NOT NULL DEFAULT '{}'::jsonb,
  secrets_encrypted TEXT,
  is_enabled BOOLEAN NOT NULL DEFAULT TRUE,
  created_by TEXT NOT NULL,
  updated_by TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE UNIQUE INDEX IF NOT EXISTS uq_app_integrations_tenant_name
  ON app_integrations (tenant_id, name);
CREATE INDEX IF NOT EXISTS idx_app_integrations_tenant_platform
  ON app_integrations (tenant_id, platform_id);
`;

export type GatewayDatabase = PostgresJsDatabase<typeof schema>;

/** Options for creating the database client. */
export interface DatabaseOptions {
  url: string;
  maxConnections?: number;
  /** Seconds before an idle connection is closed. */
  idleTimeout?: number;
}

/** Wrapper around the Drizzle client with lifecycle hooks. */
export interface Database {
  /** Drizzle instance used by repositories. */
  client: GatewayDatabase;
  /** Create tables and indexes if they do not exist yet. */
  ensureSchema(): Promise<void>;
  /** Close every pooled connection. */
  disconnect(): Promise<void>;
}

/** Strip the password from a connection string before logging it. */
export function redactConnectionString(url: string): string {
  return url.replace(/:[^:@/]+@/, ':****@');
}

/**
 * Create the Database. Connections open lazily on first query.
 */
export function createDatabase(options: DatabaseOptions): Database {
  const sql = postgres(options.url, {
    max: options.maxConnections ?? 10,
    idle_timeout: options.idleTimeout ?? 30,
    onnotice: (notice) => {
      logger.debug('Postgres notice', { component: 'database', message: notice['message'] });
    },
  });
  const client = drizzle(sql, { schema });

  return {
    client,

    async ensureSchema(): Promise<void> {
      await sql.unsafe(SCHEMA_DDL);
      logger.info('Database schema ensured', {
        component: 'database',
        url: redactConnectionString(options.url),
      });
    },

    async disconnect(): Promise<void> {
      await sql.end();
      logger.info('Database disconnected', { component: 'database' });
    },
  };
}
