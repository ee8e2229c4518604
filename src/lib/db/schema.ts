// src/lib/db/schema.ts
import { pgTable, serial, text, doublePrecision, boolean } from 'drizzle-orm/pg-core';

export const plants = pgTable('plants', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  image: text('image').notNull(),
  price: doublePrecision('price').notNull(),
  isInStock: boolean('is_in_stock').notNull().default(true),
});

// Kept in step with the table above; drizzle-kit owns anything beyond the first table.
export const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS plants (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL,
  image TEXT NOT NULL,
  price DOUBLE PRECISION NOT NULL,
  is_in_stock BOOLEAN NOT NULL DEFAULT TRUE
);
`;
