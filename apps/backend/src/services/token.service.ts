// ──────────────────────────────────────────────
// Coachgate - Token Issuer
// HS256 session tokens signed through @fastify/jwt
// ──────────────────────────────────────────────

import { randomUUID } from "node:crypto";
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { TokenClaims, TokenPair, TokenType, User } from "@coachgate/types";
import type { AppConfig } from "@coachgate/utils";

export type JwtSigner = FastifyInstance["jwt"];

export type TokenVerification =
  | { valid: true; claims: TokenClaims }
  | { valid: false; reason: "invalid" | "expired" };

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  typ: z.enum(["access", "refresh"]),
  jti: z.string().min(1),
  sid: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  iss: z.string(),
  aud: z.string(),
});

/**
 * Deny-list of revoked sessions. Entries are kept until the longest-lived
 * token of the session would have expired anyway.
 */
export interface TokenRevocationList {
  revoke(sessionId: string, expiresAtMs: number): void;
  isRevoked(sessionId: string): boolean;
  prune(): number;
}

export function createTokenRevocationList(clock: () => number = Date.now): TokenRevocationList {
  const revoked = new Map<string, number>();

  return {
    revoke(sessionId, expiresAtMs) {
      const current = revoked.get(sessionId) ?? 0;
      revoked.set(sessionId, Math.max(current, expiresAtMs));
    },

    isRevoked(sessionId) {
      const expiresAt = revoked.get(sessionId);
      return expiresAt !== undefined && expiresAt > clock();
    },

    prune() {
      const now = clock();
      let removed = 0;
      for (const [sessionId, expiresAt] of revoked) {
        if (expiresAt <= now) {
          revoked.delete(sessionId);
          removed++;
        }
      }
      return removed;
    },
  };
}

export interface TokenIssuer {
  issue(user: Pick<User, "id" | "email">): TokenPair;
  issueAccessToken(user: Pick<User, "id" | "email">, sessionId: string): { accessToken: string; expiresIn: number };
  verify(token: string, expectedType?: TokenType): TokenVerification;
  revoke(claims: TokenClaims): void;
}

export interface TokenIssuerOptions {
  jwt: Pick<AppConfig["jwt"], "issuer" | "audience" | "accessExpiresMinutes" | "refreshExpiresDays">;
  revocations: TokenRevocationList;
  /** Wall-clock milliseconds; token timestamps are absolute. */
  clock?: () => number;
}

export function createTokenIssuer(signer: JwtSigner, options: TokenIssuerOptions): TokenIssuer {
  const clock = options.clock ?? Date.now;
  const { issuer, audience } = options.jwt;
  const accessTtlSeconds = options.jwt.accessExpiresMinutes * 60;
  const refreshTtlSeconds = options.jwt.refreshExpiresDays * 24 * 60 * 60;

  function sign(user: Pick<User, "id" | "email">, typ: TokenType, sessionId: string, ttlSeconds: number): string {
    const iat = Math.floor(clock() / 1000);
    const claims: TokenClaims = {
      sub: user.id,
      email: user.email,
      typ,
      jti: randomUUID(),
      sid: sessionId,
      iat,
      exp: iat + ttlSeconds,
      iss: issuer,
      aud: audience,
    };
    return signer.sign(claims);
  }

  function issueAccessToken(user: Pick<User, "id" | "email">, sessionId: string) {
    return { accessToken: sign(user, "access", sessionId, accessTtlSeconds), expiresIn: accessTtlSeconds };
  }

  return {
    issue(user) {
      const sessionId = randomUUID();
      const { accessToken, expiresIn } = issueAccessToken(user, sessionId);
      return {
        accessToken,
        refreshToken: sign(user, "refresh", sessionId, refreshTtlSeconds),
        tokenType: "bearer",
        expiresIn,
      };
    },

    issueAccessToken,

    verify(token, expectedType = "access") {
      let decoded: object | string;
      try {
        decoded = signer.verify<object | string>(token);
      } catch (err) {
        const code = err instanceof Error && "code" in err ? String(err.code) : "";
        return { valid: false, reason: code.includes("EXPIRED") ? "expired" : "invalid" };
      }

      const parsed = tokenClaimsSchema.safeParse(decoded);
      if (!parsed.success) {
        return { valid: false, reason: "invalid" };
      }

      const claims = parsed.data;
      if (claims.iss !== issuer || claims.aud !== audience || claims.typ !== expectedType) {
        return { valid: false, reason: "invalid" };
      }
      if (claims.exp * 1000 <= clock()) {
        return { valid: false, reason: "expired" };
      }
      if (options.revocations.isRevoked(claims.sid)) {
        return { valid: false, reason: "invalid" };
      }

      return { valid: true, claims };
    },

    revoke(claims) {
      options.revocations.revoke(claims.sid, (claims.iat + refreshTtlSeconds) * 1000);
    },
  };
}
