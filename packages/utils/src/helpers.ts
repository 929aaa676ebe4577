// ──────────────────────────────────────────────
// Coachgate - Utility Helpers
// ──────────────────────────────────────────────

export function measureDuration(startTime: bigint): number {
  const duration = process.hrtime.bigint() - startTime;
  return Number(duration / 1_000_000n); // Convert nanoseconds to milliseconds
}

export function startTimer(): bigint {
  return process.hrtime.bigint();
}

// Milliseconds on a clock that never jumps with wall-clock changes
export function monotonicNow(): number {
  return Number(process.hrtime.bigint() / 1_000_000n);
}

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // Strip potential API key leaks from error messages
    return error.message
      .replace(/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]")
      .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]");
  }
  return "An unexpected error occurred";
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
