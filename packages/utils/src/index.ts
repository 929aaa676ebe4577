// ──────────────────────────────────────────────
// Coachgate - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, REDACTED_PATHS } from "./logger.js";
export {
  loadConfig,
  getEnvOrThrow,
  getEnvOrDefault,
  getEnvAsNumber,
  getEnvAsBoolean,
  getFirstEnv,
} from "./config.js";
export type { AppConfig, RateLimitPolicy, PasswordPolicyConfig } from "./config.js";
export {
  measureDuration,
  startTimer,
  monotonicNow,
  sanitizeErrorMessage,
  normalizeEmail,
} from "./helpers.js";
