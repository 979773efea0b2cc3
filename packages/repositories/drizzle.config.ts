// Migrations for the occupancy store: areas, prior_sets and
// sensor_history. Run through the workspace scripts so paths resolve
// from this package.

import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './migrations',
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/roomsense',
  },
});
