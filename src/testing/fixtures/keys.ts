/**
 * Deterministic key material for tests. Never use outside tests.
 */
import { createKeyRing } from '@/secrets/key-ring.js';
import type { KeyRing } from '@/secrets/types.js';

export const TEST_KEY_1 = Buffer.alloc(32, 1).toString('base64');
export const TEST_KEY_2 = Buffer.alloc(32, 2).toString('base64');

/** Ring with `k1` active, or `k2` active and `k1` retired after rotation. */
export function createTestKeyRing(active: 'k1' | 'k2' = 'k1'): KeyRing {
  if (active === 'k1') {
    return createKeyRing({ activeKeyId: 'k1', keys: [{ id: 'k1', key: TEST_KEY_1 }] });
  }
  return createKeyRing({
    activeKeyId: 'k2',
    keys: [
      { id: 'k1', key: TEST_KEY_1 },
      { id: 'k2', key: TEST_KEY_2 },
    ],
  });
}
