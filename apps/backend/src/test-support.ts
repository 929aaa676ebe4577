// ──────────────────────────────────────────────
// Coachgate - Test Fixtures
// ──────────────────────────────────────────────

import type { FastifyInstance } from "fastify";
import { createInMemoryUserRepository, type InMemoryUserRepository } from "@coachgate/database/testing";
import type { AppConfig } from "@coachgate/utils";
import { buildApp, type AppDependencies } from "./app.js";

export const TEST_PASSWORD = "TestPassword123!";

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: "test",
    logLevel: "silent",
    postgres: { url: "postgres://unused" },
    backend: { port: 0, host: "127.0.0.1", corsOrigins: ["http://localhost:3000"], trustProxy: false },
    jwt: {
      secret: "test-secret",
      issuer: "coachgate",
      audience: "coachgate-users",
      accessExpiresMinutes: 30,
      refreshExpiresDays: 7,
    },
    ai: {
      credentials: { gemini: "test-gemini-key", openai: "test-openai-key" },
      defaultProvider: "gemini",
      timeoutMs: 1000,
    },
    authRateLimits: {
      register: { max: 10, windowSeconds: 60 },
      login: { max: 15, windowSeconds: 300 },
      refresh: { max: 10, windowSeconds: 60 },
    },
    rateLimit: { max: 1000, windowMs: 60000 },
    passwordPolicy: {
      minLength: 8,
      maxLength: 72,
      requireUppercase: true,
      requireLowercase: true,
      requireDigit: true,
      requireSpecial: true,
    },
    ...overrides,
  };
}

/** A settable monotonic clock in milliseconds. */
export function createManualClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

export interface TestApp {
  app: FastifyInstance;
  users: InMemoryUserRepository;
}

export async function createTestApp(
  options: Partial<Pick<AppDependencies, "config" | "monotonicClock" | "providerFactory">> = {}
): Promise<TestApp> {
  const users = createInMemoryUserRepository();
  const app = await buildApp({
    config: options.config ?? createTestConfig(),
    users,
    saltRounds: 4,
    monotonicClock: options.monotonicClock,
    providerFactory: options.providerFactory,
  });
  await app.ready();
  return { app, users };
}
