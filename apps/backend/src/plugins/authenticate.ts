// ──────────────────────────────────────────────
// Coachgate - Bearer Authentication Decorator
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { TokenClaims } from "@coachgate/types";
import { InvalidTokenError } from "../errors.js";
import type { TokenIssuer } from "../services/token.service.js";

declare module "fastify" {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }

  interface FastifyRequest {
    auth: TokenClaims | null;
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  const match = header ? BEARER_PATTERN.exec(header.trim()) : null;
  return match?.[1] ?? null;
}

/** Authenticated user claims; only valid inside routes guarded by `app.authenticate`. */
export function requireAuth(request: FastifyRequest): TokenClaims {
  if (!request.auth) {
    throw new InvalidTokenError();
  }
  return request.auth;
}

export function registerAuthenticate(app: FastifyInstance, tokens: TokenIssuer): void {
  app.decorateRequest("auth", null);

  app.decorate("authenticate", async function (request: FastifyRequest, _reply: FastifyReply) {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new InvalidTokenError();
    }

    const verification = tokens.verify(token, "access");
    if (!verification.valid) {
      request.log.debug({ reason: verification.reason }, "Rejected bearer token");
      throw new InvalidTokenError();
    }

    request.auth = verification.claims;
  });
}
