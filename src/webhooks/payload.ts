/**
 * Decode a verified webhook body according to its content type.
 */
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

/** Slack interactivity posts `payload=<json>` as a form field. */
const FORM_JSON_FIELD = 'payload';

export function parseWebhookPayload(
  rawBody: Buffer,
  contentType: string | undefined,
): Result<unknown, string> {
  const mediaType = contentType?.split(';')[0]?.trim().toLowerCase() ?? '';
  const text = rawBody.toString('utf8');

  if (mediaType === 'application/x-www-form-urlencoded') {
    const fields = Object.fromEntries(new URLSearchParams(text));
    const embedded = fields[FORM_JSON_FIELD];
    if (embedded === undefined) return ok(fields);
    try {
      return ok(JSON.parse(embedded));
    } catch {
      return err('Form field "payload" is not valid JSON');
    }
  }

  if (text.trim() === '') return ok(null);

  if (mediaType === '' || mediaType === 'application/json' || mediaType.endsWith('+json')) {
    try {
      return ok(JSON.parse(text));
    } catch {
      return err('Request body is not valid JSON');
    }
  }

  return ok(text);
}
