/**
 * LegacyMigrator: pulls credential fields out of a plain configuration map.
 * Clients that still send secrets inside `configuration` are migrated on every
 * create and update; running it on already-migrated data changes nothing.
 */
import { ValidationError } from '@/core/errors.js';
import { normalizePlatformId } from '@/integrations/platforms.js';
import type { PlatformId } from '@/integrations/platforms.js';

import type { ExtractedSecrets } from './types.js';

/** Configuration fields treated as secrets, per platform. */
export const LEGACY_SECRET_FIELDS: Readonly<Record<PlatformId, readonly string[]>> = {
  slack: ['signingSecret', 'botToken', 'incomingWebhookUrl'],
  msteams: ['appPassword'],
  outlook: ['clientSecret'],
  webhook: ['secret'],
};

/**
 * Split `configuration` into a secret bundle and the remaining settings.
 * Neither input is mutated. Empty-string values are dropped from both outputs.
 *
 * @throws ValidationError for an unsupported platform or a non-string secret value
 */
export function extractLegacySecrets(
  platform: string,
  configuration: Readonly<Record<string, unknown>>,
): ExtractedSecrets {
  const platformId = normalizePlatformId(platform);
  if (platformId === undefined) {
    throw new ValidationError(`Unsupported platform: ${platform}`, { platform });
  }

  const secrets: Record<string, string> = {};
  const remaining: Record<string, unknown> = { ...configuration };

  for (const field of LEGACY_SECRET_FIELDS[platformId]) {
    if (!Object.hasOwn(remaining, field)) continue;
    const value = remaining[field];
    delete remaining[field];

    if (value === null || value === undefined || value === '') continue;
    if (typeof value !== 'string') {
      throw new ValidationError(`Secret field "${field}" must be a string`, {
        platform: platformId,
        field,
      });
    }
    secrets[field] = value;
  }

  return { secrets, configuration: remaining };
}

/** True when `configuration` still carries any secret field for the platform. */
export function hasLegacySecrets(
  platformId: PlatformId,
  configuration: Readonly<Record<string, unknown>>,
): boolean {
  return LEGACY_SECRET_FIELDS[platformId].some((field) => Object.hasOwn(configuration, field));
}
