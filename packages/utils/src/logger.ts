// ──────────────────────────────────────────────
// Coachgate - Structured Logger (Pino)
// ──────────────────────────────────────────────

import pino from "pino";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export const REDACTED_PATHS = [
  "apiKey",
  "secret",
  "password",
  "passwordHash",
  "access_token",
  "refresh_token",
  "accessToken",
  "refreshToken",
  "authorization",
  "cookie",
  "*.password",
  "*.passwordHash",
  "req.headers.authorization",
  "req.headers.cookie",
];

export const rootLogger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: {
    paths: REDACTED_PATHS,
    censor: "[REDACTED]",
  },
});

export function createLogger(module: string, extra?: Record<string, unknown>): pino.Logger {
  return rootLogger.child({ module, ...extra });
}
