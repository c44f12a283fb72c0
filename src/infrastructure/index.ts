// Database client
export { createDatabase, redactConnectionString } from './database.js';
export type { Database, DatabaseOptions, GatewayDatabase } from './database.js';

export { appIntegrations } from './schema.js';
export type { AppIntegrationRow } from './schema.js';

// Repositories
export {
  createAppIntegrationRepository,
  createInMemoryAppIntegrationRepository,
  toAppIntegrationRecord,
} from './repositories/index.js';
export type { InMemoryAppIntegrationRepository } from './repositories/index.js';
