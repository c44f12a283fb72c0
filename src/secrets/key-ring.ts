/**
 * KeyRing: immutable set of AES-256 keys loaded from configuration at boot.
 */
import { StartupConfigurationError } from '@/core/errors.js';
import { toKeyId } from '@/core/types.js';
import type { KeyId } from '@/core/types.js';
import type { EncryptionConfig } from '@/config/types.js';

import { KEY_LENGTH } from './crypto.js';
import type { KeyRing, KeyRingEntry } from './types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

function decodeKey(keyId: string, encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!BASE64_PATTERN.test(trimmed)) {
    throw new StartupConfigurationError(`Encryption key "${keyId}" is not valid base64`, {
      keyId,
    });
  }
  const key = Buffer.from(trimmed, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new StartupConfigurationError(
      `Encryption key "${keyId}" must decode to ${KEY_LENGTH.toString()} bytes, got ${key.length.toString()}`,
      { keyId, length: key.length },
    );
  }
  return key;
}

/**
 * Build the key ring from the encryption section of the gateway config.
 *
 * @throws StartupConfigurationError if a key id repeats, a key is not 32 bytes,
 *   or the active key id is not in the ring
 */
export function createKeyRing(config: EncryptionConfig): KeyRing {
  const entries = new Map<string, KeyRingEntry>();

  for (const { id, key } of config.keys) {
    if (entries.has(id)) {
      throw new StartupConfigurationError(`Encryption key id "${id}" is configured more than once`, {
        keyId: id,
      });
    }
    entries.set(id, Object.freeze({ keyId: toKeyId(id), key: decodeKey(id, key) }));
  }

  const active = entries.get(config.activeKeyId);
  if (active === undefined) {
    throw new StartupConfigurationError(
      `Active encryption key "${config.activeKeyId}" is not present in the key ring`,
      { activeKeyId: config.activeKeyId, keyIds: [...entries.keys()] },
    );
  }

  const ids: readonly KeyId[] = Object.freeze([...entries.values()].map((entry) => entry.keyId));

  return Object.freeze({
    activeKeyId: active.keyId,

    getActive(): KeyRingEntry {
      return active;
    },

    lookup(keyId: string): KeyRingEntry | undefined {
      return entries.get(keyId);
    },

    keyIds(): readonly KeyId[] {
      return ids;
    },
  });
}
