// ──────────────────────────────────────────────
// Coachgate - Auth Service
// Received → Validated → RateChecked → Persisted/Authenticated → TokenIssued
// ──────────────────────────────────────────────

import bcrypt from "bcrypt";
import type { UserPreferencesPatch, UserRepository } from "@coachgate/database";
import type {
  AuthResult,
  LoginInput,
  PreferencesUpdate,
  PublicUser,
  RegisterInput,
  TokenClaims,
  User,
} from "@coachgate/types";
import { DEFAULT_LANGUAGE } from "@coachgate/types";
import { createLogger, normalizeEmail } from "@coachgate/utils";
import {
  DuplicateEmailError,
  InvalidCredentialsError,
  InvalidTokenError,
  NotFoundError,
  RateLimitedError,
  ValidationError,
} from "../errors.js";
import { exceedsBcryptLimit, type PasswordPolicy } from "./password-policy.js";
import type { ProviderSelector } from "./provider-selector.js";
import type { AuthRateLimiters, RateLimiter } from "./rate-limiter.js";
import type { TokenIssuer } from "./token.service.js";

const logger = createLogger("auth-service");
const SALT_ROUNDS = 12;

export interface AuthServiceDeps {
  users: UserRepository;
  providers: ProviderSelector;
  tokens: TokenIssuer;
  rateLimiters: AuthRateLimiters;
  passwordPolicy: PasswordPolicy;
  saltRounds?: number;
}

export interface RefreshResult {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

export interface AuthService {
  register(input: RegisterInput, clientKey: string): Promise<AuthResult>;
  login(input: LoginInput, clientKey: string): Promise<AuthResult>;
  refresh(refreshToken: string, clientKey: string): Promise<RefreshResult>;
  logout(claims: TokenClaims): void;
  getProfile(userId: string): Promise<PublicUser>;
  updatePreferences(userId: string, update: PreferencesUpdate): Promise<PublicUser>;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const { users, providers, tokens, rateLimiters, passwordPolicy } = deps;
  const saltRounds = deps.saltRounds ?? SALT_ROUNDS;

  // Compared against when the email is unknown so both failure paths cost one bcrypt round
  let dummyHash: Promise<string> | null = null;
  function getDummyHash(): Promise<string> {
    dummyHash ??= bcrypt.hash("coachgate-timing-equalizer", saltRounds);
    return dummyHash;
  }

  function admit(limiter: RateLimiter, action: string, clientKey: string): void {
    const admission = limiter.admit(clientKey);
    if (!admission.allowed) {
      logger.warn({ action, clientKey, retryAfter: admission.retryAfterSeconds }, "Rate limit exceeded");
      throw new RateLimitedError(admission.retryAfterSeconds);
    }
  }

  return {
    async register(input, clientKey) {
      const email = normalizeEmail(input.email);

      const passwordErrors = passwordPolicy.check(input.password);
      if (passwordErrors.length > 0) {
        throw new ValidationError(`Password validation failed: ${passwordErrors.join("; ")}`, {
          password: passwordErrors,
        });
      }

      admit(rateLimiters.register, "register", clientKey);

      logger.info({ email }, "Registering user");

      const existing = await users.findByEmail(email);
      if (existing) {
        throw new DuplicateEmailError();
      }

      const credential = providers.resolve(input.preferredAiProvider);
      const passwordHash = await bcrypt.hash(input.password, saltRounds);

      const result = await users.create({
        email,
        passwordHash,
        preferredAiProvider: credential.provider,
        preferredLanguage: input.preferredLanguage ?? DEFAULT_LANGUAGE,
      });

      if (!result.created) {
        throw new DuplicateEmailError();
      }

      logger.info({ userId: result.user.id, provider: credential.provider }, "User registered");
      return { user: toPublicUser(result.user), tokens: tokens.issue(result.user) };
    },

    async login(input, clientKey) {
      const email = normalizeEmail(input.email);

      admit(rateLimiters.login, "login", clientKey);

      logger.info({ email }, "Login attempt");

      const user = await users.findByEmail(email);
      // bcrypt would compare only the first 72 bytes, so longer passwords never match
      if (!user || exceedsBcryptLimit(input.password)) {
        await bcrypt.compare(input.password, await getDummyHash());
        throw new InvalidCredentialsError();
      }

      const valid = await bcrypt.compare(input.password, user.passwordHash);
      if (!valid || !user.isActive) {
        throw new InvalidCredentialsError();
      }

      const loggedInAt = new Date();
      await users.recordLogin(user.id, loggedInAt);

      logger.info({ userId: user.id }, "User logged in");
      return {
        user: toPublicUser({ ...user, lastLoginAt: loggedInAt }),
        tokens: tokens.issue(user),
      };
    },

    async refresh(refreshToken, clientKey) {
      admit(rateLimiters.refresh, "refresh", clientKey);

      const verification = tokens.verify(refreshToken, "refresh");
      if (!verification.valid) {
        throw new InvalidTokenError();
      }

      const user = await users.findById(verification.claims.sub);
      if (!user || !user.isActive) {
        throw new InvalidTokenError();
      }

      const { accessToken, expiresIn } = tokens.issueAccessToken(user, verification.claims.sid);
      return { accessToken, tokenType: "bearer", expiresIn };
    },

    logout(claims) {
      tokens.revoke(claims);
      logger.info({ userId: claims.sub }, "User logged out");
    },

    async getProfile(userId) {
      const user = await users.findById(userId);
      if (!user) {
        throw new NotFoundError("User not found");
      }
      return toPublicUser(user);
    },

    async updatePreferences(userId, update) {
      const patch: UserPreferencesPatch = {};
      if (update.preferredAiProvider !== undefined) {
        patch.preferredAiProvider = providers.resolve(update.preferredAiProvider).provider;
      }
      if (update.preferredLanguage !== undefined) {
        patch.preferredLanguage = update.preferredLanguage;
      }

      const user = await users.updatePreferences(userId, patch);
      if (!user) {
        throw new NotFoundError("User not found");
      }

      logger.info({ userId, ...patch }, "User preferences updated");
      return toPublicUser(user);
    },
  };
}
