// src/services/server/plant-service.ts

import { asc, eq } from 'drizzle-orm';
import type { z } from 'zod';
import type { PlantDatabase } from '@/lib/db/client';
import { plants } from '@/lib/db/schema';
import { toPlantDict, type PlantDict, type PlantRow } from '@/lib/types';
import { PlantServiceError, ok, fail, getErrorMessage, type PlantResult } from '@/lib/errors';
import {
  createPlantSchema,
  updatePlantSchema,
  formatValidationIssues,
  toNewPlantRow,
  toPlantChanges,
} from '@/features/plants/utils/validation.utils';

const PLANT_NOT_FOUND = 'Plant not found';

const notFound = () => new PlantServiceError(PLANT_NOT_FOUND, 'NOT_FOUND');

function storageFailure(error: unknown, context: string): PlantServiceError {
  console.error(`❌ [PlantService/${context}] Storage error:`, error);
  return new PlantServiceError(getErrorMessage(error), 'STORAGE', error);
}

async function findRow(db: PlantDatabase, id: number): Promise<PlantRow | undefined> {
  const [row] = await db.select().from(plants).where(eq(plants.id, id)).limit(1);
  return row;
}

function invalidBody(error: z.ZodError): PlantServiceError {
  const details = formatValidationIssues(error);
  return new PlantServiceError(details.join('; '), 'VALIDATION', error, details);
}

/**
 * Every plant, oldest first.
 */
export async function listPlants(db: PlantDatabase): Promise<PlantDict[]> {
  const rows = await db.select().from(plants).orderBy(asc(plants.id));
  return rows.map(toPlantDict);
}

export async function getPlant(db: PlantDatabase, id: number): Promise<PlantDict | null> {
  const row = await findRow(db, id);
  return row ? toPlantDict(row) : null;
}

/**
 * Validates a raw request body and inserts it as a new plant.
 * Nothing is written when validation fails.
 */
export async function createPlant(db: PlantDatabase, body: unknown): Promise<PlantResult<PlantDict>> {
  const parsed = createPlantSchema.safeParse(body);
  if (!parsed.success) {
    return fail(invalidBody(parsed.error));
  }

  try {
    const [created] = await db.insert(plants).values(toNewPlantRow(parsed.data)).returning();
    return ok(toPlantDict(created));
  } catch (error) {
    return fail(storageFailure(error, 'create'));
  }
}

/**
 * Applies the allow-listed fields of `body` to an existing plant.
 *
 * `body` is the request body as the handler read it, or the reason it could
 * not be read; an unknown id wins over an unreadable body. A body with
 * nothing to change returns the plant as it is.
 */
export async function updatePlant(
  db: PlantDatabase,
  id: number,
  body: PlantResult<unknown>
): Promise<PlantResult<PlantDict>> {
  try {
    const existing = await findRow(db, id);
    if (!existing) {
      return fail(notFound());
    }
    if (!body.ok) {
      return fail(body.error);
    }

    const parsed = updatePlantSchema.safeParse(body.value);
    if (!parsed.success) {
      return fail(invalidBody(parsed.error));
    }

    const changes = toPlantChanges(parsed.data);
    if (Object.keys(changes).length === 0) {
      return ok(toPlantDict(existing));
    }

    const [updated] = await db.update(plants).set(changes).where(eq(plants.id, id)).returning();
    // The row can vanish between the lookup and the update under a concurrent DELETE.
    return updated ? ok(toPlantDict(updated)) : fail(notFound());
  } catch (error) {
    return fail(storageFailure(error, 'update'));
  }
}

export async function deletePlant(db: PlantDatabase, id: number): Promise<PlantResult<null>> {
  try {
    const deleted = await db.delete(plants).where(eq(plants.id, id)).returning({ id: plants.id });
    return deleted.length > 0 ? ok(null) : fail(notFound());
  } catch (error) {
    return fail(storageFailure(error, 'delete'));
  }
}
