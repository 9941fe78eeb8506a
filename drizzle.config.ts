import dotenv from 'dotenv';
import { defineConfig } from 'drizzle-kit';
import dotenvConfig from './backend/utils/dotenv-config';

dotenvConfig(dotenv);

export default defineConfig({
  dialect: 'postgresql',
  schema: './shared/db/schema/incidents.ts',
  out: './backend/db/migrations',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
});
