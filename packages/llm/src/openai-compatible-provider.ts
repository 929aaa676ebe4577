// ──────────────────────────────────────────────
// Coachgate - OpenAI-Compatible Providers (OpenAI, Groq)
// ──────────────────────────────────────────────

import type {
  CredentialHandle,
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
} from "@coachgate/types";
import { DEFAULT_LLM_OPTIONS, PROVIDER_MODELS } from "@coachgate/types";
import { startTimer, measureDuration } from "@coachgate/utils";
import { postJson } from "./request.js";

const CHAT_COMPLETIONS_URLS = {
  openai: "https://api.openai.com/v1/chat/completions",
  groq: "https://api.groq.com/openai/v1/chat/completions",
} as const;

export type OpenAICompatibleProviderId = keyof typeof CHAT_COMPLETIONS_URLS;

export class OpenAICompatibleProvider implements LLMProvider {
  readonly provider: OpenAICompatibleProviderId;
  private readonly credential: CredentialHandle;
  private readonly model: string;
  private readonly defaults: Required<LLMRequestOptions>;

  constructor(
    provider: OpenAICompatibleProviderId,
    credential: CredentialHandle,
    model?: string,
    defaults: LLMRequestOptions = {}
  ) {
    this.provider = provider;
    this.credential = credential;
    this.model = (model && model.trim()) || PROVIDER_MODELS[provider];
    this.defaults = { ...DEFAULT_LLM_OPTIONS, ...defaults };
  }

  async generate(prompt: string, options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const mergedOptions = { ...this.defaults, ...options };
    const timer = startTimer();

    const messages: Array<{ role: string; content: string }> = [];
    if (mergedOptions.systemPrompt) {
      messages.push({ role: "system", content: mergedOptions.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const data = await this.credential.use((apiKey) =>
      postJson<ChatCompletionResponse>(
        this.provider,
        CHAT_COMPLETIONS_URLS[this.provider],
        { Authorization: `Bearer ${apiKey}` },
        {
          model: this.model,
          messages,
          max_tokens: mergedOptions.maxTokens,
          temperature: mergedOptions.temperature,
        },
        mergedOptions.timeoutMs
      )
    );

    const content = data.choices?.[0]?.message?.content ?? "";
    const usage = data.usage;

    return {
      content,
      provider: this.provider,
      model: this.model,
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      durationMs: measureDuration(timer),
    };
  }
}

// OpenAI chat completions response shape
interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}
