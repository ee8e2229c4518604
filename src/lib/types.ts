// src/lib/types.ts
import type { plants } from './db/schema';

export type PlantRow = typeof plants.$inferSelect;
export type NewPlantRow = typeof plants.$inferInsert;

/**
 * The flat JSON shape every endpoint returns for a plant.
 */
export interface PlantDict {
  id: number;
  name: string;
  image: string;
  price: number;
  is_in_stock: boolean;
}

export const toPlantDict = (row: PlantRow): PlantDict => ({
  id: row.id,
  name: row.name,
  image: row.image,
  price: row.price,
  is_in_stock: row.isInStock,
});
