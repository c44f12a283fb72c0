/**
 * SecretMasker: display-only redaction applied at the API response boundary.
 */
import type { MaskedSecretBundle, SecretBundle } from './types.js';

export const SECRET_MASK = '****';

/** Values at or below this length are replaced entirely. */
const MIN_PARTIAL_MASK_LENGTH = 9;
const VISIBLE_CHARS = 4;

/**
 * `abcd****wxyz` for values longer than 8 characters, `****` otherwise.
 * Lengths count code points, so a surrogate pair is never split.
 */
export function maskSecretValue(value: string): string {
  const chars = [...value];
  if (chars.length < MIN_PARTIAL_MASK_LENGTH) return SECRET_MASK;
  const head = chars.slice(0, VISIBLE_CHARS).join('');
  const tail = chars.slice(-VISIBLE_CHARS).join('');
  return `${head}${SECRET_MASK}${tail}`;
}

/** Mask every field. Empty values are dropped. */
export function maskSecretBundle(bundle: SecretBundle): MaskedSecretBundle {
  const masked: Record<string, string> = {};
  for (const [field, value] of Object.entries(bundle)) {
    if (value === '') continue;
    masked[field] = maskSecretValue(value);
  }
  return masked;
}
