// ──────────────────────────────────────────────
// Coachgate - Service Errors
// ──────────────────────────────────────────────

export class ServiceError extends Error {
  readonly code: string;
  readonly statusCode: number;
  // When false the client only sees a generic failure; details stay in the logs
  readonly expose: boolean;

  constructor(message: string, code: string, statusCode: number, expose = true) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.statusCode = statusCode;
    this.expose = expose;
  }
}

export class ValidationError extends ServiceError {
  readonly errors: Record<string, string[] | undefined> | undefined;

  constructor(message: string, errors?: Record<string, string[] | undefined>) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

export class DuplicateEmailError extends ServiceError {
  constructor() {
    super("Email address is already registered", "DUPLICATE_EMAIL", 400);
    this.name = "DuplicateEmailError";
  }
}

export class RateLimitedError extends ServiceError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message = "Too many attempts. Please try again later.") {
    super(message, "RATE_LIMITED", 429);
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

// Same message whether the account is missing, inactive or the password is wrong
export class InvalidCredentialsError extends ServiceError {
  constructor() {
    super("Invalid email or password", "INVALID_CREDENTIALS", 401);
    this.name = "InvalidCredentialsError";
  }
}

export class InvalidTokenError extends ServiceError {
  constructor() {
    super("Invalid or expired token", "INVALID_TOKEN", 401);
    this.name = "InvalidTokenError";
  }
}

export class UnknownProviderError extends ServiceError {
  constructor(requested: string | null | undefined) {
    super(
      `No AI provider credential available (requested: ${requested || "none"}, no default configured)`,
      "UNKNOWN_PROVIDER",
      500,
      false
    );
    this.name = "UnknownProviderError";
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}
