/**
 * Run history lives in a single SQLite table. After changing src/db/schema/,
 * run `npm run db:generate` and review the generated SQL before committing.
 * The service itself creates the table on boot (see src/db/migrate.ts).
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: ["./src/db/schema/containers.ts"],
  out: "./drizzle/migrations",
  dialect: "sqlite",
  dbCredentials: { url: process.env.MAESTRO_DB_PATH || "./data/maestro.db" },
});
