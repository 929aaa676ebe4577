// ──────────────────────────────────────────────
// Coachgate - AI Provider Types
// ──────────────────────────────────────────────

// Also the resolution order when no usable default is configured
export const AI_PROVIDERS = ["gemini", "openai", "groq"] as const;

export type AiProviderId = (typeof AI_PROVIDERS)[number];

export function isAiProviderId(value: unknown): value is AiProviderId {
  return typeof value === "string" && AI_PROVIDERS.some((id) => id === value);
}

export interface LLMRequestOptions {
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  systemPrompt?: string;
}

export interface LLMResponse {
  content: string;
  provider: AiProviderId;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  durationMs: number;
}

export interface LLMProvider {
  readonly provider: AiProviderId;
  generate(prompt: string, options?: LLMRequestOptions): Promise<LLMResponse>;
}

export const DEFAULT_LLM_OPTIONS: Required<LLMRequestOptions> = {
  maxTokens: 2048,
  temperature: 0.7,
  timeoutMs: 30000,
  systemPrompt: "You are a helpful coding coach.",
};

export const PROVIDER_MODELS: Record<AiProviderId, string> = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
  groq: "llama-3.3-70b-versatile",
};

export interface ProviderStatus {
  configured: AiProviderId[];
  defaultProvider: AiProviderId | null;
}

/**
 * Server-side reference to an operator-owned provider secret. The secret is
 * only lent to a callback; serialised forms of a handle never contain it.
 */
export interface CredentialHandle {
  readonly provider: AiProviderId;
  use<T>(fn: (secret: string) => T): T;
}
