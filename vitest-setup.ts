// vitest-setup.ts
import { vi, afterEach } from 'vitest';
import { closeDb } from '@/lib/db/client';
import { resetConfig } from '@/lib/config';

// Every test gets a fresh in-memory store, so ids start at 1 again.
process.env.DATABASE_URL = ':memory:';

afterEach(async () => {
  await closeDb();
  resetConfig();
  vi.restoreAllMocks();
});
