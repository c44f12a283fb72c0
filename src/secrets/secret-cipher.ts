/**
 * SecretCipher: encrypts secret bundles under the active key and reverses the
 * process for any key still in the ring.
 *
 * Serialized form: `<keyId>:<base64(iv ‖ ciphertext ‖ authTag)>`.
 * The key id is bound as GCM additional data, so relabelling a blob with another
 * key id fails authentication instead of decrypting under the wrong key.
 */
import { z } from 'zod';

import { InvalidCiphertextError, KeyNotFoundError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { toKeyId } from '@/core/types.js';
import { KEY_ID_PATTERN } from '@/config/schema.js';

import { AUTH_TAG_LENGTH, IV_LENGTH, open, seal } from './crypto.js';
import type { EncryptedBlob, KeyRing, KeyRingEntry, SecretBundle } from './types.js';

export type SecretDecryptionError = KeyNotFoundError | InvalidCiphertextError;

const BLOB_SEPARATOR = ':';
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const secretBundleSchema = z.record(z.string());

function keyIdAad(keyId: string): Buffer {
  return Buffer.from(keyId, 'utf8');
}

// ─── Encrypt / Decrypt ──────────────────────────────────────────

/** Encrypt a bundle with a fresh IV under the given (active) key. */
export function encryptSecretBundle(bundle: SecretBundle, activeKey: KeyRingEntry): EncryptedBlob {
  const plaintext = Buffer.from(JSON.stringify(bundle), 'utf8');
  const sealed = seal(plaintext, activeKey.key, keyIdAad(activeKey.keyId));
  return { keyId: activeKey.keyId, ...sealed };
}

/**
 * Decrypt a blob with the key its id names.
 * Returns KeyNotFoundError when the id is not in the ring and InvalidCiphertextError
 * when authentication fails or the plaintext is not a bundle.
 */
export function decryptSecretBundle(
  blob: EncryptedBlob,
  ring: KeyRing,
): Result<SecretBundle, SecretDecryptionError> {
  const entry = ring.lookup(blob.keyId);
  if (entry === undefined) {
    return err(new KeyNotFoundError(blob.keyId));
  }

  let plaintext: Buffer;
  try {
    plaintext = open(blob, entry.key, keyIdAad(entry.keyId));
  } catch (error) {
    return err(
      new InvalidCiphertextError(
        'Secret blob failed authentication',
        blob.keyId,
        error instanceof Error ? error : undefined,
      ),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext.toString('utf8'));
  } catch {
    return err(new InvalidCiphertextError('Decrypted secret blob is not valid JSON', blob.keyId));
  }

  const bundle = secretBundleSchema.safeParse(parsed);
  if (!bundle.success) {
    return err(
      new InvalidCiphertextError('Decrypted secret blob is not a secret bundle', blob.keyId),
    );
  }
  return ok(bundle.data);
}

// ─── Serialization ──────────────────────────────────────────────

export function serializeEncryptedBlob(blob: EncryptedBlob): string {
  const body = Buffer.concat([blob.iv, blob.ciphertext, blob.authTag]).toString('base64');
  return `${blob.keyId}${BLOB_SEPARATOR}${body}`;
}

/** Split a serialized blob back into its parts without decrypting it. */
export function parseEncryptedBlob(
  serialized: string,
): Result<EncryptedBlob, InvalidCiphertextError> {
  const separator = serialized.indexOf(BLOB_SEPARATOR);
  if (separator < 0) {
    return err(new InvalidCiphertextError('Secret blob has no key id prefix'));
  }

  const keyId = serialized.slice(0, separator);
  const body = serialized.slice(separator + 1);
  if (!KEY_ID_PATTERN.test(keyId)) {
    return err(new InvalidCiphertextError('Secret blob has a malformed key id'));
  }
  if (!BASE64_PATTERN.test(body)) {
    return err(new InvalidCiphertextError('Secret blob body is not valid base64', keyId));
  }

  const bytes = Buffer.from(body, 'base64');
  if (bytes.length < IV_LENGTH + AUTH_TAG_LENGTH) {
    return err(new InvalidCiphertextError('Secret blob is truncated', keyId));
  }

  return ok({
    keyId: toKeyId(keyId),
    iv: bytes.subarray(0, IV_LENGTH),
    ciphertext: bytes.subarray(IV_LENGTH, bytes.length - AUTH_TAG_LENGTH),
    authTag: bytes.subarray(bytes.length - AUTH_TAG_LENGTH),
  });
}

// ─── Convenience ────────────────────────────────────────────────

/** Encrypt and serialize in one step, as stored in `secretsEncrypted`. */
export function sealSecretBundle(bundle: SecretBundle, ring: KeyRing): string {
  return serializeEncryptedBlob(encryptSecretBundle(bundle, ring.getActive()));
}

/** Parse and decrypt a stored `secretsEncrypted` value. */
export function openSecretBundle(
  serialized: string,
  ring: KeyRing,
): Result<SecretBundle, SecretDecryptionError> {
  const blob = parseEncryptedBlob(serialized);
  if (!blob.ok) return blob;
  return decryptSecretBundle(blob.value, ring);
}
