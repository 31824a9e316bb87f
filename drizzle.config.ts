import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const dbUrl = process.env.DATABASE_URL;
if (!dbUrl) {
  throw new Error('DATABASE_URL environment variable is required');
}

export default defineConfig({
  schema: './shared/schema.ts',
  out: './migrations',
  dialect: 'postgresql',
  migrations: {
    table: '__dispatch_migrations',
  },
  dbCredentials: {
    url: dbUrl,
  },
  strict: true,
  verbose: true,
});

