/**
 * Types for tenant integration secrets.
 * A SecretBundle is plaintext and lives only for the duration of a request;
 * the EncryptedBlob is the only form that reaches storage.
 */
import type { KeyId } from '@/core/types.js';

// ─── Bundles ─────────────────────────────────────────────────────

/**
 * Named credential fields for one integration (signingSecret, botToken, ...).
 * The field set depends on the platform; unknown fields pass through.
 */
export type SecretBundle = Readonly<Record<string, string>>;

/** Display-safe copy of a bundle. Never persisted. */
export type MaskedSecretBundle = Readonly<Record<string, string>>;

// ─── Key Ring ────────────────────────────────────────────────────

/** One symmetric key. `key` is always 32 bytes. */
export interface KeyRingEntry {
  readonly keyId: KeyId;
  readonly key: Buffer;
}

/**
 * Keys known to the process, loaded once at startup.
 * The active key encrypts; every key (active or retired) can decrypt.
 */
export interface KeyRing {
  readonly activeKeyId: KeyId;
  /** Key used for all new encryptions. */
  getActive(): KeyRingEntry;
  /** Resolve a key id embedded in a blob. */
  lookup(keyId: string): KeyRingEntry | undefined;
  /** Every key id in the ring, in configuration order. */
  keyIds(): readonly KeyId[];
}

// ─── Ciphertext ──────────────────────────────────────────────────

/** AES-256-GCM output tagged with the id of the key that produced it. */
export interface EncryptedBlob {
  readonly keyId: KeyId;
  readonly iv: Buffer;
  readonly ciphertext: Buffer;
  readonly authTag: Buffer;
}

// ─── Legacy Migration ────────────────────────────────────────────

export interface ExtractedSecrets {
  secrets: SecretBundle;
  /** Copy of the input configuration with every extracted field removed. */
  configuration: Record<string, unknown>;
}
