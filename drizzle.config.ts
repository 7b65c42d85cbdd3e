import { config } from 'dotenv';
import { defineConfig } from 'drizzle-kit';

config();

const url =
    process.env.DRIZZLE_ENV === 'test'
        ? process.env.DATABASE_TEST_URL
        : process.env.DATABASE_URL;

export default defineConfig({
    out: './drizzle',
    schema: './src/db/schema',
    dialect: 'postgresql',
    dbCredentials: {
        url: url ?? '',
    },
    verbose: true,
    strict: true,
});
