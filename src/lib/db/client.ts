// src/lib/db/client.ts
import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite';
import * as schema from './schema';
import { getConfig } from '@/lib/config';
import { getErrorMessage } from '@/lib/errors';

// This file is for SERVER-SIDE execution only.

export type PlantDatabase = PgliteDatabase<typeof schema>;

export interface DatabaseHandle {
  db: PlantDatabase;
  client: PGlite;
}

export const IN_MEMORY = ':memory:';

/**
 * Opens an embedded Postgres (in memory, or persisted under `dataDir`),
 * makes sure the `plants` table exists and wraps it with drizzle.
 */
export async function createDatabase(dataDir: string): Promise<DatabaseHandle> {
  try {
    console.log(`🚀 [DB] Opening database at "${dataDir}"...`);
    const client = new PGlite(dataDir === IN_MEMORY ? undefined : dataDir);
    await client.exec(schema.BOOTSTRAP_SQL);
    const db = drizzle(client, { schema });
    console.log('✅ [DB] Database ready.');
    return { db, client };
  } catch (error) {
    const errorMessage = `Could not open database "${dataDir}": ${getErrorMessage(error)}`;
    console.error('❌ [DB] Initialization error:', errorMessage);
    throw new Error(errorMessage);
  }
}

let pending: Promise<DatabaseHandle> | null = null;

/**
 * Returns the process-wide handle, creating it from config on first use.
 * Route handlers pass the result down to the service layer explicitly.
 */
export async function getDb(): Promise<PlantDatabase> {
  if (!pending) {
    // A failed open is retried on the next request.
    pending = createDatabase(getConfig().databasePath).catch((error: unknown) => {
      pending = null;
      throw error;
    });
  }
  const handle = await pending;
  return handle.db;
}

export async function closeDb(): Promise<void> {
  if (!pending) return;
  const current = pending;
  pending = null;
  const handle = await current;
  await handle.client.close();
}
