// Tenant app integrations and their encrypted credentials
export type {
  AppIntegration,
  AppIntegrationFilter,
  AppIntegrationRecord,
  AppIntegrationRecordUpdate,
  AppIntegrationRepository,
  CreateIntegrationInput,
  IntegrationSecretStore,
  NewAppIntegrationRecord,
  SecretsStatus,
  UpdateIntegrationInput,
} from './types.js';

export {
  PLATFORM_DISPLAY_NAMES,
  PLATFORM_IDS,
  REQUIRED_FIELDS,
  normalizePlatformId,
} from './platforms.js';
export type { PlatformId } from './platforms.js';

export { createIntegrationSecretStore } from './integration-secret-store.js';
