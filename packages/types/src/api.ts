// ──────────────────────────────────────────────
// Coachgate - API Response Types
// ──────────────────────────────────────────────

export interface ApiErrorResponse {
  detail: string;
  code: string;
  retry_after?: number;
  errors?: Record<string, string[]>;
}

export type HealthState = "healthy" | "unhealthy";

export interface HealthCheckResult {
  status: HealthState;
  detail?: string;
}

export interface HealthResponse {
  status: HealthState;
  timestamp: string;
  checks: Record<string, HealthCheckResult>;
}
