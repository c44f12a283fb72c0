/**
 * AES-256-GCM primitives for secret bundles.
 * Uses Node.js built-in `crypto` module.
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
export const KEY_LENGTH = 32;
export const IV_LENGTH = 12; // 96-bit IV recommended for GCM
export const AUTH_TAG_LENGTH = 16; // 128-bit tag

export interface SealedPayload {
  iv: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

/**
 * Encrypt with a fresh random IV. `aad` is authenticated but not encrypted.
 */
export function seal(plaintext: Buffer, key: Buffer, aad: Buffer): SealedPayload {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return { iv, ciphertext, authTag: cipher.getAuthTag() };
}

/**
 * Decrypt and authenticate.
 * Throws if the auth tag is invalid (tampered ciphertext, IV, AAD or wrong key).
 */
export function open(payload: SealedPayload, key: Buffer, aad: Buffer): Buffer {
  const decipher = createDecipheriv(ALGORITHM, key, payload.iv, {
    authTagLength: AUTH_TAG_LENGTH,
  });
  decipher.setAAD(aad);
  decipher.setAuthTag(payload.authTag);

  return Buffer.concat([decipher.update(payload.ciphertext), decipher.final()]);
}

/** 32 cryptographically random bytes, suitable as a key ring entry. */
export function generateKeyMaterial(): Buffer {
  return randomBytes(KEY_LENGTH);
}
