// ──────────────────────────────────────────────
// Coachgate - Environment Configuration Helper
// ──────────────────────────────────────────────

import type { AiProviderId } from "@coachgate/types";

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export function getEnvAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
  }
}

// First non-empty value among the given variable names
export function getFirstEnv(keys: string[]): string | undefined {
  for (const key of keys) {
    const value = process.env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

export interface RateLimitPolicy {
  max: number;
  windowSeconds: number;
}

export interface PasswordPolicyConfig {
  minLength: number;
  maxLength: number;
  requireUppercase: boolean;
  requireLowercase: boolean;
  requireDigit: boolean;
  requireSpecial: boolean;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;

  postgres: {
    url: string;
  };

  backend: {
    port: number;
    host: string;
    corsOrigins: string[];
    trustProxy: boolean;
  };

  jwt: {
    secret: string;
    issuer: string;
    audience: string;
    accessExpiresMinutes: number;
    refreshExpiresDays: number;
  };

  ai: {
    credentials: Partial<Record<AiProviderId, string>>;
    defaultProvider: string;
    timeoutMs: number;
  };

  authRateLimits: {
    register: RateLimitPolicy;
    login: RateLimitPolicy;
    refresh: RateLimitPolicy;
  };

  rateLimit: {
    max: number;
    windowMs: number;
  };

  passwordPolicy: PasswordPolicyConfig;
}

function loadProviderCredentials(): Partial<Record<AiProviderId, string>> {
  const credentials: Partial<Record<AiProviderId, string>> = {};

  const gemini = getFirstEnv(["SYSTEM_GEMINI_API_KEY", "GEMINI_API_KEY"]);
  if (gemini) credentials.gemini = gemini;

  const openai = getFirstEnv(["SYSTEM_OPENAI_API_KEY", "OPENAI_API_KEY"]);
  if (openai) credentials.openai = openai;

  const groq = getFirstEnv(["SYSTEM_GROQ_API_KEY", "GROQ_API_KEY"]);
  if (groq) credentials.groq = groq;

  return credentials;
}

export function loadConfig(): AppConfig {
  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    postgres: {
      url: getEnvOrThrow("DATABASE_URL"),
    },

    backend: {
      port: getEnvAsNumber("BACKEND_PORT", 8000),
      host: getEnvOrDefault("BACKEND_HOST", "0.0.0.0"),
      corsOrigins: getEnvOrDefault("CORS_ORIGINS", "http://localhost:3000")
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
      // X-Forwarded-For decides request.ip, which keys the auth rate limits
      trustProxy: getEnvAsBoolean("TRUST_PROXY", false),
    },

    jwt: {
      secret: getEnvOrThrow("JWT_SECRET"),
      issuer: getEnvOrDefault("JWT_ISSUER", "coachgate"),
      audience: getEnvOrDefault("JWT_AUDIENCE", "coachgate-users"),
      accessExpiresMinutes: getEnvAsNumber("JWT_ACCESS_EXPIRES_MINUTES", 30),
      refreshExpiresDays: getEnvAsNumber("JWT_REFRESH_EXPIRES_DAYS", 7),
    },

    ai: {
      credentials: loadProviderCredentials(),
      defaultProvider: getEnvOrDefault("DEFAULT_AI_PROVIDER", "gemini"),
      timeoutMs: getEnvAsNumber("AI_REQUEST_TIMEOUT_MS", 30000),
    },

    authRateLimits: {
      register: {
        max: getEnvAsNumber("REGISTER_RATE_LIMIT_MAX", 10),
        windowSeconds: getEnvAsNumber("REGISTER_RATE_LIMIT_WINDOW_SECONDS", 60),
      },
      login: {
        max: getEnvAsNumber("LOGIN_RATE_LIMIT_MAX", 15),
        windowSeconds: getEnvAsNumber("LOGIN_RATE_LIMIT_WINDOW_SECONDS", 300),
      },
      refresh: {
        max: getEnvAsNumber("REFRESH_RATE_LIMIT_MAX", 10),
        windowSeconds: getEnvAsNumber("REFRESH_RATE_LIMIT_WINDOW_SECONDS", 60),
      },
    },

    rateLimit: {
      max: getEnvAsNumber("RATE_LIMIT_MAX", 100),
      windowMs: getEnvAsNumber("RATE_LIMIT_WINDOW_MS", 60000),
    },

    passwordPolicy: {
      minLength: getEnvAsNumber("PASSWORD_MIN_LENGTH", 8),
      maxLength: getEnvAsNumber("PASSWORD_MAX_LENGTH", 72),
      requireUppercase: getEnvAsBoolean("PASSWORD_REQUIRE_UPPERCASE", true),
      requireLowercase: getEnvAsBoolean("PASSWORD_REQUIRE_LOWERCASE", true),
      requireDigit: getEnvAsBoolean("PASSWORD_REQUIRE_DIGIT", true),
      requireSpecial: getEnvAsBoolean("PASSWORD_REQUIRE_SPECIAL", true),
    },
  };
}
