// ──────────────────────────────────────────────
// Coachgate - Error Handler
// Every failure leaves as {detail, code, retry_after?, errors?}
// ──────────────────────────────────────────────

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ApiErrorResponse } from "@coachgate/types";
import { ProviderRequestError, UpstreamUnavailableError } from "@coachgate/llm";
import { createLogger, sanitizeErrorMessage } from "@coachgate/utils";
import { RateLimitedError, ServiceError, ValidationError } from "../errors.js";

const logger = createLogger("error-handler");

const INTERNAL_ERROR: ApiErrorResponse = { detail: "Internal server error", code: "INTERNAL_ERROR" };

function sendServiceError(reply: FastifyReply, error: ServiceError) {
  const body: ApiErrorResponse = { detail: error.message, code: error.code };

  if (error instanceof RateLimitedError) {
    body.retry_after = error.retryAfterSeconds;
    reply.header("Retry-After", String(error.retryAfterSeconds));
  }
  if (error instanceof ValidationError && error.errors) {
    const errors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(error.errors)) {
      if (messages && messages.length > 0) errors[field] = messages;
    }
    if (Object.keys(errors).length > 0) body.errors = errors;
  }
  if (error.statusCode === 401) {
    reply.header("WWW-Authenticate", "Bearer");
  }

  return reply.status(error.statusCode).send(body);
}

export function registerErrorHandler(app: FastifyInstance, nodeEnv: string): void {
  app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ServiceError) {
      if (!error.expose) {
        logger.error({ code: error.code, message: error.message, url: request.url }, "Service misconfiguration");
        return reply.status(error.statusCode).send(INTERNAL_ERROR);
      }
      return sendServiceError(reply, error);
    }

    if (error instanceof UpstreamUnavailableError) {
      logger.warn({ provider: error.provider, status: error.status, message: error.message }, "AI provider unavailable");
      return reply.status(502).send({
        detail: "AI provider is temporarily unavailable. Please retry.",
        code: "UPSTREAM_UNAVAILABLE",
      } satisfies ApiErrorResponse);
    }

    if (error instanceof ProviderRequestError) {
      logger.error({ provider: error.provider, status: error.status, message: error.message }, "AI provider rejected request");
      return reply.status(500).send(INTERNAL_ERROR);
    }

    // Framework errors (malformed JSON, payload too large, global request ceiling)
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        detail: error.message,
        code: statusCode === 429 ? "RATE_LIMITED" : error.code ?? "BAD_REQUEST",
      } satisfies ApiErrorResponse);
    }

    logger.error({
      message: sanitizeErrorMessage(error),
      statusCode,
      stack: nodeEnv === "development" ? error.stack : undefined,
    }, "Unhandled error");

    return reply.status(500).send(INTERNAL_ERROR);
  });
}
