// ──────────────────────────────────────────────
// Coachgate - LLM Provider Errors
// ──────────────────────────────────────────────

import type { AiProviderId } from "@coachgate/types";

/** Transient downstream failure: timeout, network error, 429 or 5xx. Safe to retry. */
export class UpstreamUnavailableError extends Error {
  readonly provider: AiProviderId;
  readonly status: number | null;

  constructor(provider: AiProviderId, message: string, status: number | null = null) {
    super(message);
    this.name = "UpstreamUnavailableError";
    this.provider = provider;
    this.status = status;
  }
}

export class ProviderRequestError extends Error {
  readonly provider: AiProviderId;
  readonly status: number;

  constructor(provider: AiProviderId, message: string, status: number) {
    super(message);
    this.name = "ProviderRequestError";
    this.provider = provider;
    this.status = status;
  }
}
