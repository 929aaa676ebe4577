// ──────────────────────────────────────────────
// Coachgate - LLM Provider Factory
// ──────────────────────────────────────────────

import type { CredentialHandle, LLMProvider, LLMRequestOptions } from "@coachgate/types";
import { GeminiProvider } from "./gemini-provider.js";
import { OpenAICompatibleProvider } from "./openai-compatible-provider.js";

export function createLLMProvider(
  credential: CredentialHandle,
  model?: string,
  defaults?: LLMRequestOptions
): LLMProvider {
  switch (credential.provider) {
    case "gemini":
      return new GeminiProvider(credential, model, defaults);
    case "openai":
    case "groq":
      return new OpenAICompatibleProvider(credential.provider, credential, model, defaults);
    default:
      throw new Error(`Unsupported LLM provider: ${credential.provider as string}`);
  }
}
