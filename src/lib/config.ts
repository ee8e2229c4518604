// src/lib/config.ts
import { z } from 'zod';

// This file is for SERVER-SIDE execution only.

const DEFAULT_DATABASE_URL = 'plants-data';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).default(DEFAULT_DATABASE_URL),
  JSON_COMPACT: booleanFlag,
});

export interface AppConfig {
  /** Data directory of the embedded Postgres, or `:memory:`. */
  databasePath: string;
  jsonIndent: number;
}

/**
 * Strips a `file://` or `file:` prefix down to the data directory PGlite expects.
 */
export function toDatabasePath(url: string): string {
  if (url.startsWith('file://')) return url.slice('file://'.length);
  if (url.startsWith('file:')) return url.slice('file:'.length);
  return url;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    const errorMessage = `Invalid environment configuration: ${keys}`;
    console.error(`❌ [Config] ${errorMessage}`);
    throw new Error(errorMessage);
  }

  return {
    databasePath: toDatabasePath(parsed.data.DATABASE_URL),
    jsonIndent: parsed.data.JSON_COMPACT ? 0 : 2,
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Drops the memoised config so the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
  cachedConfig = null;
}
