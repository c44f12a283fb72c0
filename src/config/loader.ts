/**
 * Configuration loader: reads the gateway JSON config file (or the environment),
 * resolves environment variable placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { GatewayError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { gatewayConfigSchema } from './schema.js';
import type { EncryptionKeyEntryConfig, GatewayConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends GatewayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  // Numbers, booleans, null: return as-is
  return obj;
}

// ─── Validation ─────────────────────────────────────────────────

function validateGatewayConfig(
  input: unknown,
  source: Record<string, unknown>,
): Result<GatewayConfig, ConfigError> {
  const validation = gatewayConfigSchema.safeParse(input);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { ...source, issues }));
  }
  return ok(validation.data);
}

// ─── File Loader ────────────────────────────────────────────────

/**
 * Loads and validates a gateway configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadGatewayConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<GatewayConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  return validateGatewayConfig(resolved, { filePath });
}

// ─── Environment Loader ─────────────────────────────────────────

/**
 * Parse `ENCRYPTION_KEYS` in the form `id1:base64,id2:base64`.
 */
export function parseKeyList(value: string): Result<EncryptionKeyEntryConfig[], ConfigError> {
  const entries: EncryptionKeyEntryConfig[] = [];
  for (const part of value.split(',')) {
    const trimmed = part.trim();
    if (trimmed === '') continue;
    const separator = trimmed.indexOf(':');
    if (separator <= 0 || separator === trimmed.length - 1) {
      return err(
        new ConfigError('ENCRYPTION_KEYS entries must have the form "<keyId>:<base64Key>"', {
          entryIndex: entries.length,
        }),
      );
    }
    entries.push({ id: trimmed.slice(0, separator), key: trimmed.slice(separator + 1) });
  }
  return ok(entries);
}

/**
 * Build the gateway configuration from environment variables alone.
 * Used when no GATEWAY_CONFIG_PATH is set.
 *
 * `ENCRYPTION_ACTIVE_KEY_ID` may be omitted when exactly one key is listed.
 */
export function loadGatewayConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Result<GatewayConfig, ConfigError> {
  const keyList = env['ENCRYPTION_KEYS'];
  if (keyList === undefined || keyList.trim() === '') {
    return err(
      new ConfigError('ENCRYPTION_KEYS environment variable is required', {
        hint: 'Generate a key with: npm run generate-key',
      }),
    );
  }

  const keys = parseKeyList(keyList);
  if (!keys.ok) return keys;

  const onlyKey = keys.value.length === 1 ? keys.value[0] : undefined;
  const activeKeyId = env['ENCRYPTION_ACTIVE_KEY_ID'] ?? onlyKey?.id;
  if (activeKeyId === undefined) {
    return err(
      new ConfigError('ENCRYPTION_ACTIVE_KEY_ID is required when more than one key is configured'),
    );
  }

  const port = env['PORT'];
  const tolerance = env['SLACK_TIMESTAMP_TOLERANCE_SECONDS'];
  const databaseUrl = env['DATABASE_URL'];

  return validateGatewayConfig(
    {
      server: {
        port: port !== undefined ? Number(port) : undefined,
        host: env['HOST'],
        publicBaseUrl: env['PUBLIC_BASE_URL'],
      },
      encryption: { activeKeyId, keys: keys.value },
      webhooks: {
        slackTimestampToleranceSeconds: tolerance !== undefined ? Number(tolerance) : undefined,
      },
      database: databaseUrl !== undefined && databaseUrl !== '' ? { url: databaseUrl } : undefined,
    },
    { source: 'environment' },
  );
}
