// ──────────────────────────────────────────────
// Coachgate - System Credential Store
// Operator-owned provider secrets, frozen at startup
// ──────────────────────────────────────────────

import { inspect } from "node:util";
import type { AiProviderId, CredentialHandle } from "@coachgate/types";
import { AI_PROVIDERS, isAiProviderId } from "@coachgate/types";
import type { AppConfig } from "@coachgate/utils";

export interface CredentialStore {
  readonly providers: readonly AiProviderId[];
  readonly defaultProvider: AiProviderId | null;
  get(provider: AiProviderId): CredentialHandle | null;
}

const REDACTED = "[REDACTED]";

function createCredentialHandle(provider: AiProviderId, secret: string): CredentialHandle {
  const handle = {
    provider,
    use<T>(fn: (secret: string) => T): T {
      return fn(secret);
    },
    toJSON() {
      return { provider, secret: REDACTED };
    },
    [inspect.custom]() {
      return `CredentialHandle(${provider}, ${REDACTED})`;
    },
  };
  return Object.freeze(handle);
}

/**
 * The default is the configured `defaultProvider` when it has a secret,
 * otherwise the first provider in `AI_PROVIDERS` order that has one.
 */
export function createCredentialStore(ai: Pick<AppConfig["ai"], "credentials" | "defaultProvider">): CredentialStore {
  const handles = new Map<AiProviderId, CredentialHandle>();

  for (const provider of AI_PROVIDERS) {
    const secret = ai.credentials[provider]?.trim();
    if (secret) {
      handles.set(provider, createCredentialHandle(provider, secret));
    }
  }

  const requestedDefault = ai.defaultProvider.trim().toLowerCase();
  const providers = Object.freeze([...handles.keys()]);
  let defaultProvider: AiProviderId | null = providers[0] ?? null;
  if (isAiProviderId(requestedDefault) && handles.has(requestedDefault)) {
    defaultProvider = requestedDefault;
  }

  return Object.freeze({
    providers,
    defaultProvider,
    get(provider: AiProviderId) {
      return handles.get(provider) ?? null;
    },
  });
}
