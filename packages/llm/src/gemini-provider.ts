// ──────────────────────────────────────────────
// Coachgate - Gemini Provider Implementation
// ──────────────────────────────────────────────

import type {
  AiProviderId,
  CredentialHandle,
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
} from "@coachgate/types";
import { DEFAULT_LLM_OPTIONS, PROVIDER_MODELS } from "@coachgate/types";
import { startTimer, measureDuration } from "@coachgate/utils";
import { postJson } from "./request.js";

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

// Map deprecated model names to their current replacements
const DEPRECATED_MODEL_MAP: Record<string, string> = {
  "gemini-pro": "gemini-2.0-flash",
  "gemini-pro-vision": "gemini-2.0-flash",
  "gemini-ultra": "gemini-2.0-flash",
};

export class GeminiProvider implements LLMProvider {
  readonly provider: AiProviderId = "gemini";
  private readonly credential: CredentialHandle;
  private readonly model: string;
  private readonly defaults: Required<LLMRequestOptions>;

  constructor(credential: CredentialHandle, model?: string, defaults: LLMRequestOptions = {}) {
    this.credential = credential;
    const requested = (model && model.trim()) || PROVIDER_MODELS.gemini;
    this.model = DEPRECATED_MODEL_MAP[requested] ?? requested;
    this.defaults = { ...DEFAULT_LLM_OPTIONS, ...defaults };
  }

  async generate(prompt: string, options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const mergedOptions = { ...this.defaults, ...options };
    const timer = startTimer();

    const data = await this.credential.use((apiKey) =>
      postJson<GeminiAPIResponse>(
        this.provider,
        `${GEMINI_API_BASE}/${this.model}:generateContent`,
        { "x-goog-api-key": apiKey },
        {
          contents: [
            {
              parts: [{ text: prompt }],
            },
          ],
          systemInstruction: mergedOptions.systemPrompt
            ? { parts: [{ text: mergedOptions.systemPrompt }] }
            : undefined,
          generationConfig: {
            maxOutputTokens: mergedOptions.maxTokens,
            temperature: mergedOptions.temperature,
          },
        },
        mergedOptions.timeoutMs
      )
    );

    const content = data.candidates?.[0]?.content?.parts?.[0]?.text ?? "";
    const usage = data.usageMetadata;

    return {
      content,
      provider: this.provider,
      model: this.model,
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      durationMs: measureDuration(timer),
    };
  }
}

// Gemini API response shape (minimal)
interface GeminiAPIResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}
