// ──────────────────────────────────────────────
// Coachgate - Health Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { UserRepository } from "@coachgate/database";
import type { HealthCheckResult, HealthResponse } from "@coachgate/types";
import { createLogger, sanitizeErrorMessage } from "@coachgate/utils";
import type { ProviderSelector } from "../services/provider-selector.js";
import { AUTH_PREFIX } from "./auth.routes.js";

const logger = createLogger("health");

export function registerHealthRoutes(
  app: FastifyInstance,
  users: UserRepository,
  providers: ProviderSelector
): void {
  async function runChecks(): Promise<HealthResponse> {
    const checks: Record<string, HealthCheckResult> = {};

    try {
      await users.ping();
      checks["database"] = { status: "healthy" };
    } catch (err) {
      logger.error({ error: sanitizeErrorMessage(err) }, "Database health check failed");
      checks["database"] = { status: "unhealthy", detail: "Database unreachable" };
    }

    checks["credentials"] = providers.status().defaultProvider
      ? { status: "healthy" }
      : { status: "unhealthy", detail: "No AI provider credential configured" };

    const healthy = Object.values(checks).every((check) => check.status === "healthy");
    return {
      status: healthy ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  async function handler(_request: FastifyRequest, reply: FastifyReply) {
    const result = await runChecks();
    return reply.status(result.status === "healthy" ? 200 : 503).send(result);
  }

  app.get("/health", handler);
  app.get(`${AUTH_PREFIX}/health`, handler);
}
