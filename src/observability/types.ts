// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  tenantId?: string;
  integrationId?: string;
  keyId?: string;
  component: string;
  [key: string]: unknown;
}

// ─── Security Counters ──────────────────────────────────────────

/** Operational events worth counting for alerting. */
export type SecurityEvent =
  | 'decrypt_key_not_found'
  | 'decrypt_invalid_ciphertext'
  | 'webhook_rejected'
  | 'webhook_signature_failed';

export type SecurityCounterSnapshot = Record<SecurityEvent, number>;
