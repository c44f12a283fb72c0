// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing an IntegrationId where a TenantId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type TenantId = Brand<string, 'TenantId'>;
export type IntegrationId = Brand<string, 'IntegrationId'>;
export type KeyId = Brand<string, 'KeyId'>;

/** Brand a raw tenant id taken from a route parameter. */
export function toTenantId(value: string): TenantId {
  return value as TenantId;
}

/** Brand a raw integration id taken from a route parameter. */
export function toIntegrationId(value: string): IntegrationId {
  return value as IntegrationId;
}

/** Brand a key id read from configuration or a serialized blob. */
export function toKeyId(value: string): KeyId {
  return value as KeyId;
}
