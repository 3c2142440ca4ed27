import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: ['./src/db/schema/users.ts', './src/db/schema/products.ts'],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
