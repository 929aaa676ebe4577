// ──────────────────────────────────────────────
// Coachgate - Provider Selector
// ──────────────────────────────────────────────

import type { CredentialHandle, ProviderStatus } from "@coachgate/types";
import { isAiProviderId } from "@coachgate/types";
import { createLogger } from "@coachgate/utils";
import { UnknownProviderError } from "../errors.js";
import type { CredentialStore } from "./credential-store.js";

const logger = createLogger("provider-selector");

export interface ProviderSelector {
  /** Never fails while a default provider is configured. */
  resolve(requested?: string | null): CredentialHandle;
  status(): ProviderStatus;
}

export function createProviderSelector(store: CredentialStore): ProviderSelector {
  return {
    resolve(requested) {
      const normalized = requested?.trim().toLowerCase() ?? "";

      if (isAiProviderId(normalized)) {
        const handle = store.get(normalized);
        if (handle) return handle;
      }

      const fallback = store.defaultProvider ? store.get(store.defaultProvider) : null;
      if (!fallback) {
        logger.error({ requested: normalized || null }, "No AI provider credential configured");
        throw new UnknownProviderError(normalized);
      }

      if (normalized) {
        logger.warn(
          { requested: normalized, provider: fallback.provider },
          "Requested AI provider unavailable, using default"
        );
      }
      return fallback;
    },

    status() {
      return {
        configured: [...store.providers],
        defaultProvider: store.defaultProvider,
      };
    },
  };
}
