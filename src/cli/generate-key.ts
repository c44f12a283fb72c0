/**
 * Operator tool: generate a new encryption key for the key ring.
 *
 * Prints a key id and 32 random bytes as base64, plus the lines to add to the
 * environment. Keys are never generated by the running service.
 *
 * Usage: npm run generate-key -- [--id <keyId>] [--existing "<id>:<key>,..."]
 */
import { pathToFileURL } from 'node:url';

import { KEY_ID_PATTERN } from '@/config/schema.js';
import { generateKeyMaterial } from '@/secrets/crypto.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

export interface GenerateKeyArgs {
  keyId?: string;
  /** Current ENCRYPTION_KEYS value; the new key is appended to it. */
  existing?: string;
}

export function parseCliArgs(argv: string[]): GenerateKeyArgs {
  const args: GenerateKeyArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--id' || arg === '-i') && next) {
      args.keyId = next;
      i++;
    } else if ((arg === '--existing' || arg === '-e') && next) {
      args.existing = next;
      i++;
    }
  }

  return args;
}

/** `k` followed by the UTC date, e.g. `k20260504`. */
export function defaultKeyId(now: Date): string {
  return `k${now.toISOString().slice(0, 10).replaceAll('-', '')}`;
}

// ─── Output ─────────────────────────────────────────────────────

export interface GeneratedKey {
  keyId: string;
  key: string;
}

export function formatEnvLines(generated: GeneratedKey, existing?: string): string[] {
  const entry = `${generated.keyId}:${generated.key}`;
  const keys = existing !== undefined && existing.trim() !== '' ? `${existing.trim()},${entry}` : entry;
  return [`ENCRYPTION_KEYS=${keys}`, `ENCRYPTION_ACTIVE_KEY_ID=${generated.keyId}`];
}

// ─── Main ───────────────────────────────────────────────────────

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));
  const keyId = args.keyId ?? defaultKeyId(new Date());

  if (!KEY_ID_PATTERN.test(keyId)) {
    console.error(`${RED}Key id must be 1-64 characters of [A-Za-z0-9_-]${RESET}`);
    process.exitCode = 1;
    return;
  }

  const generated: GeneratedKey = { keyId, key: generateKeyMaterial().toString('base64') };

  console.log(`${BOLD}Key id:${RESET} ${generated.keyId}`);
  console.log(`${BOLD}Key:${RESET}    ${generated.key}`);
  console.log(`\n${DIM}Environment:${RESET}`);
  for (const line of formatEnvLines(generated, args.existing)) {
    console.log(line);
  }
  console.log(`\n${DIM}Keep every previous key listed until no record references it.${RESET}`);
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
