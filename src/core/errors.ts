/**
 * Base error class for all gateway errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class GatewayError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'GatewayError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/**
 * Thrown while building the key ring or loading configuration at boot.
 * The process must not start serving when this is raised.
 */
export class StartupConfigurationError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'STARTUP_CONFIGURATION_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'StartupConfigurationError';
  }
}

/** A ciphertext references a key id that is not in the key ring. */
export class KeyNotFoundError extends GatewayError {
  public readonly keyId: string;

  constructor(keyId: string) {
    super({
      message: `Encryption key "${keyId}" is not present in the key ring`,
      code: 'KEY_NOT_FOUND',
      statusCode: 500,
      context: { keyId },
    });
    this.name = 'KeyNotFoundError';
    this.keyId = keyId;
  }
}

/** Authentication failed or the blob could not be parsed. */
export class InvalidCiphertextError extends GatewayError {
  public readonly keyId?: string;

  constructor(message: string, keyId?: string, cause?: Error) {
    super({
      message,
      code: 'INVALID_CIPHERTEXT',
      statusCode: 500,
      cause,
      context: keyId !== undefined ? { keyId } : undefined,
    });
    this.name = 'InvalidCiphertextError';
    this.keyId = keyId;
  }
}

/**
 * Raised when an inbound webhook carries the wrong secret or targets an unknown integration.
 * Always surfaces as a bare 404.
 */
export class WebhookSecretMismatchError extends GatewayError {
  constructor() {
    super({
      message: 'Not found',
      code: 'WEBHOOK_SECRET_MISMATCH',
      statusCode: 404,
    });
    this.name = 'WebhookSecretMismatchError';
  }
}

/** Thrown when caller input fails validation. */
export class ValidationError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when an integration does not exist or belongs to another tenant. */
export class IntegrationNotFoundError extends GatewayError {
  constructor(integrationId: string) {
    super({
      message: `Integration "${integrationId}" not found`,
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { integrationId },
    });
    this.name = 'IntegrationNotFoundError';
  }
}

/** Thrown when a tenant already has an integration with the requested name. */
export class DuplicateIntegrationError extends GatewayError {
  constructor(tenantId: string, name: string) {
    super({
      message: `An integration named "${name}" already exists for tenant "${tenantId}"`,
      code: 'DUPLICATE_INTEGRATION',
      statusCode: 409,
      context: { tenantId, name },
    });
    this.name = 'DuplicateIntegrationError';
  }
}

/**
 * Thrown when a write would replace a secret bundle that cannot be decrypted.
 * The stored blob stays as-is so it can be read again once the key is restored.
 */
export class SecretsUnavailableError extends GatewayError {
  constructor(integrationId: string, secretsStatus: string) {
    super({
      message: `Stored secrets for integration "${integrationId}" cannot be decrypted; supply a full replacement including webhookSecret`,
      code: 'SECRETS_UNAVAILABLE',
      statusCode: 409,
      context: { integrationId, secretsStatus },
    });
    this.name = 'SecretsUnavailableError';
  }
}
