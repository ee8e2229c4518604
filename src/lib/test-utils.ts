// src/lib/test-utils.ts
import { sql } from 'drizzle-orm';
import type { PlantDatabase } from '@/lib/db/client';

/**
 * Makes every UPDATE or DELETE on `plants` fail inside the store with the message "locked".
 */
export async function lockPlants(db: PlantDatabase, operation: 'UPDATE' | 'DELETE'): Promise<void> {
  await db.execute(
    sql.raw(`CREATE OR REPLACE FUNCTION refuse_plant_change() RETURNS trigger AS $$
BEGIN
  RAISE EXCEPTION 'locked';
END;
$$ LANGUAGE plpgsql`)
  );
  await db.execute(
    sql.raw(
      `CREATE TRIGGER plants_locked_${operation.toLowerCase()} BEFORE ${operation} ON plants ` +
        'FOR EACH ROW EXECUTE FUNCTION refuse_plant_change()'
    )
  );
}
