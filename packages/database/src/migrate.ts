// ──────────────────────────────────────────────
// Coachgate - Database Migration Runner
// Usage: npm run db:migrate -w @coachgate/database
// ──────────────────────────────────────────────

import { migrate } from "drizzle-orm/postgres-js/migrator";
import { getDatabase, closeConnection } from "./connection.js";
import { createLogger } from "@coachgate/utils";

const logger = createLogger("migrate");

async function runMigrations() {
  const databaseUrl = process.env["DATABASE_URL"];
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for migrations");
  }

  logger.info("Running migrations");
  const db = getDatabase(databaseUrl);
  await migrate(db, { migrationsFolder: "./drizzle" });
  logger.info("Migrations completed successfully");
  await closeConnection();
  process.exit(0);
}

runMigrations().catch((err: unknown) => {
  logger.error({ error: err }, "Migration failed");
  process.exit(1);
});
