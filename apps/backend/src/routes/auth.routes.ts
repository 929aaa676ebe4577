// ──────────────────────────────────────────────
// Coachgate - Auth Routes
// Controllers only — business logic in services
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { AuthResult, PublicUser } from "@coachgate/types";
import {
  loginSchema,
  parseBody,
  refreshSchema,
  registerSchema,
  updatePreferencesSchema,
} from "../validation/schemas.js";
import type { AuthService } from "../services/auth.service.js";
import type { ProviderSelector } from "../services/provider-selector.js";
import { requireAuth } from "../plugins/authenticate.js";

export const AUTH_PREFIX = "/api/v1/auth";

function toProfileResponse(user: PublicUser) {
  return {
    user_id: user.id,
    email: user.email,
    preferred_ai_provider: user.preferredAiProvider,
    preferred_language: user.preferredLanguage,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
    last_login: user.lastLoginAt ? user.lastLoginAt.toISOString() : null,
  };
}

function toAuthResponse({ user, tokens }: AuthResult) {
  return {
    user_id: user.id,
    email: user.email,
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: tokens.tokenType,
    expires_in: tokens.expiresIn,
    preferred_ai_provider: user.preferredAiProvider,
    preferred_language: user.preferredLanguage,
  };
}

export function registerAuthRoutes(
  app: FastifyInstance,
  authService: AuthService,
  providers: ProviderSelector
): void {
  app.post(`${AUTH_PREFIX}/register`, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(registerSchema, request.body);

    const result = await authService.register(
      {
        email: body.email,
        password: body.password,
        preferredAiProvider: body.preferred_ai_provider ?? undefined,
        preferredLanguage: body.preferred_language ?? undefined,
      },
      request.ip
    );

    return reply.status(201).send(toAuthResponse(result));
  });

  app.post(`${AUTH_PREFIX}/login`, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(loginSchema, request.body);

    const result = await authService.login({ email: body.email, password: body.password }, request.ip);

    return reply.send({
      ...toAuthResponse(result),
      last_login: result.user.lastLoginAt ? result.user.lastLoginAt.toISOString() : null,
    });
  });

  app.post(`${AUTH_PREFIX}/refresh`, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseBody(refreshSchema, request.body);

    const result = await authService.refresh(body.refresh_token, request.ip);

    return reply.send({
      access_token: result.accessToken,
      token_type: result.tokenType,
      expires_in: result.expiresIn,
    });
  });

  app.register(async function scopedRoutes(scoped: FastifyInstance) {
    // All routes in this scope require authentication
    scoped.addHook("onRequest", app.authenticate);

    scoped.post(`${AUTH_PREFIX}/logout`, async (request: FastifyRequest, reply: FastifyReply) => {
      authService.logout(requireAuth(request));
      return reply.send({ message: "Successfully logged out" });
    });

    scoped.get(`${AUTH_PREFIX}/me`, async (request: FastifyRequest, reply: FastifyReply) => {
      const user = await authService.getProfile(requireAuth(request).sub);
      return reply.send(toProfileResponse(user));
    });

    scoped.put(`${AUTH_PREFIX}/me`, async (request: FastifyRequest, reply: FastifyReply) => {
      const body = parseBody(updatePreferencesSchema, request.body);

      const user = await authService.updatePreferences(requireAuth(request).sub, {
        preferredAiProvider: body.preferred_ai_provider,
        preferredLanguage: body.preferred_language,
      });
      return reply.send(toProfileResponse(user));
    });

    scoped.get(`${AUTH_PREFIX}/providers`, async (_request: FastifyRequest, reply: FastifyReply) => {
      const status = providers.status();
      return reply.send({ providers: status.configured, default_provider: status.defaultProvider });
    });
  });
}
