/**
 * Supported integration platforms and their configuration requirements.
 */

// ─── Platform Ids ───────────────────────────────────────────────

export const PLATFORM_IDS = ['slack', 'msteams', 'outlook', 'webhook'] as const;

export type PlatformId = (typeof PLATFORM_IDS)[number];

/** Names accepted from callers in addition to the canonical ids. */
const PLATFORM_ALIASES: Readonly<Record<string, PlatformId>> = {
  teams: 'msteams',
  generic: 'webhook',
};

/**
 * Map a caller-supplied platform name to its canonical id.
 * Case-insensitive; returns undefined for unsupported platforms.
 */
export function normalizePlatformId(value: string): PlatformId | undefined {
  const lower = value.trim().toLowerCase();
  const canonical = PLATFORM_IDS.find((id) => id === lower);
  return canonical ?? PLATFORM_ALIASES[lower];
}

// ─── Configuration Requirements ─────────────────────────────────

/**
 * Fields that must be present, in either the configuration or the secret bundle,
 * before an integration for the platform can be saved.
 */
export const REQUIRED_FIELDS: Readonly<Record<PlatformId, readonly string[]>> = {
  slack: ['signingSecret'],
  msteams: ['appId', 'appPassword'],
  outlook: ['clientId', 'clientSecret', 'tenantId'],
  webhook: [],
};

/** Human-readable names used in the integration listing. */
export const PLATFORM_DISPLAY_NAMES: Readonly<Record<PlatformId, string>> = {
  slack: 'Slack',
  msteams: 'Microsoft Teams',
  outlook: 'Outlook',
  webhook: 'Generic Webhook',
};
