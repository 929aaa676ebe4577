// ──────────────────────────────────────────────
// Coachgate - Backend API Server
// ──────────────────────────────────────────────

import { getDatabase, closeConnection, createUserRepository } from "@coachgate/database";
import { loadConfig, createLogger } from "@coachgate/utils";
import { buildApp } from "./app.js";

const logger = createLogger("server");

async function bootstrap(): Promise<void> {
  const config = loadConfig();

  // Database
  const db = getDatabase(config.postgres.url);
  const users = createUserRepository(db);

  const app = await buildApp({ config, users });

  // Start server
  try {
    await app.listen({ port: config.backend.port, host: config.backend.host });
    logger.info({
      port: config.backend.port,
      environment: config.nodeEnv,
    }, "Coachgate API started");
  } catch (err) {
    logger.error({ error: err }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await app.close();
    await closeConnection();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

bootstrap().catch((err: unknown) => {
  logger.error({ error: err }, "Bootstrap failed");
  process.exit(1);
});
