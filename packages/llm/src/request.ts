// ──────────────────────────────────────────────
// Coachgate - Provider HTTP Request Helper
// ──────────────────────────────────────────────

import type { AiProviderId } from "@coachgate/types";
import { sanitizeErrorMessage } from "@coachgate/utils";
import { ProviderRequestError, UpstreamUnavailableError } from "./errors.js";

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * POSTs a JSON body and returns the parsed JSON answer. Every failure mode is
 * reported as either `UpstreamUnavailableError` (retryable) or
 * `ProviderRequestError` (the request or the credential was rejected).
 */
export async function postJson<T>(
  provider: AiProviderId,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      signal: controller.signal,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "Unknown error");
      const message = `${provider} API request failed with status ${response.status}: ${errorBody}`;
      if (isTransientStatus(response.status)) {
        throw new UpstreamUnavailableError(provider, message, response.status);
      }
      throw new ProviderRequestError(provider, message, response.status);
    }

    return (await response.json()) as T;
  } catch (error) {
    if (error instanceof UpstreamUnavailableError || error instanceof ProviderRequestError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new UpstreamUnavailableError(provider, `${provider} request timed out after ${timeoutMs}ms`);
    }
    throw new UpstreamUnavailableError(provider, `${provider} request failed: ${sanitizeErrorMessage(error)}`);
  } finally {
    clearTimeout(timeout);
  }
}
