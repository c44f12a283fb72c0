/**
 * Webhook secrets are the path segment that authenticates inbound deliveries.
 * They are random strings, unrelated to encryption key material.
 */
import { nanoid } from 'nanoid';

import { ValidationError } from '@/core/errors.js';

export const WEBHOOK_SECRET_FIELD = 'webhookSecret';
export const WEBHOOK_SECRET_LENGTH = 32;

/** nanoid's URL-safe alphabet, fixed length. */
const WEBHOOK_SECRET_PATTERN = /^[A-Za-z0-9_-]{32}$/;

export function generateWebhookSecret(): string {
  return nanoid(WEBHOOK_SECRET_LENGTH);
}

export function isValidWebhookSecret(value: string): boolean {
  return WEBHOOK_SECRET_PATTERN.test(value);
}

/**
 * @throws ValidationError if a caller-supplied secret is not 32 URL-safe characters
 */
export function assertValidWebhookSecret(value: string): void {
  if (!isValidWebhookSecret(value)) {
    throw new ValidationError(
      `Webhook secret must be ${WEBHOOK_SECRET_LENGTH.toString()} characters of [A-Za-z0-9_-]`,
      { field: WEBHOOK_SECRET_FIELD },
    );
  }
}
