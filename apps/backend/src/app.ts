// ──────────────────────────────────────────────
// Coachgate - Application Factory
// Wires config, persistence and services into one Fastify instance
// ──────────────────────────────────────────────

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import fastifyJwt from "@fastify/jwt";
import rateLimit from "@fastify/rate-limit";
import type { UserRepository } from "@coachgate/database";
import { REDACTED_PATHS, type AppConfig } from "@coachgate/utils";
import { RateLimitedError } from "./errors.js";
import { createAuthService } from "./services/auth.service.js";
import { createCredentialStore } from "./services/credential-store.js";
import { createPasswordPolicy } from "./services/password-policy.js";
import { createProviderSelector } from "./services/provider-selector.js";
import { createAuthRateLimiters } from "./services/rate-limiter.js";
import { createTokenIssuer, createTokenRevocationList } from "./services/token.service.js";
import { registerAuthenticate } from "./plugins/authenticate.js";
import { registerErrorHandler } from "./plugins/error-handler.js";
import { registerAuthRoutes } from "./routes/auth.routes.js";
import { registerHealthRoutes } from "./routes/health.routes.js";
import { registerAiRoutes, type LLMProviderFactory } from "./routes/ai.routes.js";

const PRUNE_INTERVAL_MS = 60_000;

export interface AppDependencies {
  config: AppConfig;
  users: UserRepository;
  /** Overrides for tests */
  saltRounds?: number;
  monotonicClock?: () => number;
  providerFactory?: LLMProviderFactory;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config, users } = deps;

  // Initialize Fastify with Pino logger
  const app = Fastify({
    logger: {
      level: config.logLevel,
      timestamp: true,
      redact: { paths: REDACTED_PATHS, censor: "[REDACTED]" },
    },
    trustProxy: config.backend.trustProxy,
  });

  // Plugins
  await app.register(cors, {
    origin: config.backend.corsOrigins,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
    // Same body and Retry-After as the per-action limits
    errorResponseBuilder: (_request, context) =>
      new RateLimitedError(Math.max(1, Math.ceil(context.ttl / 1000)), `Rate limit exceeded, retry in ${context.after}`),
  });

  await app.register(fastifyJwt, {
    secret: config.jwt.secret,
  });

  registerErrorHandler(app, config.nodeEnv);

  // Services (dependency injection)
  const credentials = createCredentialStore(config.ai);
  const providers = createProviderSelector(credentials);
  const rateLimiters = createAuthRateLimiters(config.authRateLimits, deps.monotonicClock);
  const revocations = createTokenRevocationList();
  const tokens = createTokenIssuer(app.jwt, { jwt: config.jwt, revocations });
  const authService = createAuthService({
    users,
    providers,
    tokens,
    rateLimiters,
    passwordPolicy: createPasswordPolicy(config.passwordPolicy),
    saltRounds: deps.saltRounds,
  });

  const status = providers.status();
  if (status.defaultProvider) {
    app.log.info({ providers: status.configured, defaultProvider: status.defaultProvider }, "AI credentials loaded");
  } else {
    app.log.warn("No AI provider credentials configured; registration will fail until one is set");
  }

  // Routes
  registerAuthenticate(app, tokens);
  registerHealthRoutes(app, users, providers);
  registerAuthRoutes(app, authService, providers);
  registerAiRoutes(app, authService, providers, {
    timeoutMs: config.ai.timeoutMs,
    providerFactory: deps.providerFactory,
  });

  // Expired buckets and revocations are dropped in the background
  const pruneTimer = setInterval(() => {
    rateLimiters.register.prune();
    rateLimiters.login.prune();
    rateLimiters.refresh.prune();
    revocations.prune();
  }, PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  app.addHook("onClose", async () => {
    clearInterval(pruneTimer);
  });

  return app;
}
