/**
 * Configuration for entry stores.
 *
 * Resolution priority: explicit options > Environment vars > Defaults
 */

import { z } from 'zod';
import type { EntryStoreConfig, EntryStoreOptions } from '../types/config.js';
import { StoreErrorCode } from '../types/error-codes.js';
import { EntryStoreError } from './errors.js';

/** Default configuration values. */
const DEFAULTS: EntryStoreConfig = {
  atomicRewrite: false,
  fileMode: 0o644,
  logging: {
    level: 'info',
    filePath: 'logs/entry-store.log',
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'ENTRY_STORE_ATOMIC_REWRITE': 'atomicRewrite',
  'ENTRY_STORE_LOG_LEVEL': 'logging.level',
  'ENTRY_STORE_LOG_FILE': 'logging.filePath',
};

const configSchema = z.object({
  atomicRewrite: z.boolean(),
  fileMode: z.number().int().min(0).max(0o777),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    filePath: z.string().min(1),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Record<string, unknown> = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (!isPlainObject(next)) {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    } else {
      current = next;
    }
  }
  current[parts[parts.length - 1] ?? path] = value;
}

/**
 * Deep merge two values. Source values override target values;
 * undefined source values keep the target.
 */
function deepMerge(target: unknown, source: unknown): unknown {
  if (source === undefined) return target;
  if (!isPlainObject(target) || !isPlainObject(source)) return source;
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    result[key] = deepMerge(result[key], source[key]);
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Resolve the effective configuration.
 * Throws CONFIG_ERROR when the merged result is invalid.
 */
export function loadConfig(
  overrides: EntryStoreOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): EntryStoreConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      setNestedValue(fromEnv, configPath, parseEnvValue(envValue));
    }
  }

  const merged = deepMerge(deepMerge(structuredClone(DEFAULTS), fromEnv), overrides);

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new EntryStoreError(
      StoreErrorCode.CONFIG_ERROR,
      `Invalid entry store configuration at ${where}: ${issue?.message ?? 'unknown issue'}`,
      {
        fix: 'Check the options passed to EntryStore.open and the ENTRY_STORE_* environment variables.',
        cause: parsed.error,
      },
    );
  }
  return parsed.data;
}

/** Default configuration, for callers that need to inspect it. */
export function getDefaultConfig(): EntryStoreConfig {
  return structuredClone(DEFAULTS);
}
