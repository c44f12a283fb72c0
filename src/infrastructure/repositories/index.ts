// Entity repositories
export { createAppIntegrationRepository, toAppIntegrationRecord } from './app-integration-repository.js';

export { createInMemoryAppIntegrationRepository } from './in-memory-app-integration-repository.js';
export type { InMemoryAppIntegrationRepository } from './in-memory-app-integration-repository.js';
