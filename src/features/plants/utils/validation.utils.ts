// src/features/plants/utils/validation.utils.ts

import { z } from 'zod';
import type { NewPlantRow } from '@/lib/types';

const plantFields = {
  name: z.string().trim().min(1, 'Name must not be empty'),
  image: z.string().trim().min(1, 'Image must not be empty'),
  price: z.number().finite().nonnegative('Price must not be negative'),
  is_in_stock: z.boolean(),
};

/**
 * Body of POST /plants. Keys outside the plant fields are dropped.
 */
export const createPlantSchema = z.object({
  ...plantFields,
  is_in_stock: plantFields.is_in_stock.default(true),
});

/**
 * Body of PATCH /plants/{id}: the fields a client may change.
 * `id` is deliberately absent, so it is stripped with any other unknown key.
 */
export const updatePlantSchema = z.object(plantFields).partial();

// Ids are Postgres `serial` values, so anything above int4 can never match.
const MAX_PLANT_ID = 2_147_483_647;

export const plantIdSchema = z
  .string()
  .regex(/^\d+$/, 'Plant id must be a whole number')
  .transform(Number)
  .refine((id) => id <= MAX_PLANT_ID, 'Plant id is out of range');

export type CreatePlantInput = z.infer<typeof createPlantSchema>;
export type UpdatePlantInput = z.infer<typeof updatePlantSchema>;

export const toNewPlantRow = (input: CreatePlantInput): NewPlantRow => ({
  name: input.name,
  image: input.image,
  price: input.price,
  isInStock: input.is_in_stock,
});

export const toPlantChanges = (input: UpdatePlantInput): Partial<NewPlantRow> => {
  const changes: Partial<NewPlantRow> = {};
  if (input.name !== undefined) changes.name = input.name;
  if (input.image !== undefined) changes.image = input.image;
  if (input.price !== undefined) changes.price = input.price;
  if (input.is_in_stock !== undefined) changes.isInStock = input.is_in_stock;
  return changes;
};

/**
 * One message per issue, prefixed with the offending field when there is one.
 */
export function formatValidationIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
