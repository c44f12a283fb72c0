/**
 * In-process counters for security-relevant events.
 * A spike in `decrypt_invalid_ciphertext` may mean tampering rather than key rotation.
 */
import type { SecurityCounterSnapshot, SecurityEvent } from './types.js';

export interface SecurityCounters {
  increment(event: SecurityEvent): void;
  snapshot(): SecurityCounterSnapshot;
}

/** Create a fresh set of counters, all starting at zero. */
export function createSecurityCounters(): SecurityCounters {
  const counts: SecurityCounterSnapshot = {
    decrypt_key_not_found: 0,
    decrypt_invalid_ciphertext: 0,
    webhook_rejected: 0,
    webhook_signature_failed: 0,
  };

  return {
    increment(event: SecurityEvent): void {
      counts[event] += 1;
    },

    snapshot(): SecurityCounterSnapshot {
      return { ...counts };
    },
  };
}
