import { defineConfig } from 'drizzle-kit';
import { toDatabasePath } from './src/lib/config';

// Schema migrations are owned by drizzle-kit; the app only creates the first table.
export default defineConfig({
  dialect: 'postgresql',
  driver: 'pglite',
  schema: './src/lib/db/schema.ts',
  out: './drizzle',
  dbCredentials: {
    url: toDatabasePath(process.env.DATABASE_URL ?? 'plants-data'),
  },
});
