// ──────────────────────────────────────────────
// Coachgate - LLM Package
// ──────────────────────────────────────────────

export { GeminiProvider } from "./gemini-provider.js";
export { OpenAICompatibleProvider } from "./openai-compatible-provider.js";
export type { OpenAICompatibleProviderId } from "./openai-compatible-provider.js";
export { createLLMProvider } from "./factory.js";
export { UpstreamUnavailableError, ProviderRequestError } from "./errors.js";
