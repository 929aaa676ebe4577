// ──────────────────────────────────────────────
// Coachgate - AI Completion Routes
// Calls go out on the operator's credential for the user's provider
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { CredentialHandle, LLMProvider, LLMRequestOptions } from "@coachgate/types";
import { createLLMProvider } from "@coachgate/llm";
import { createLogger } from "@coachgate/utils";
import type { AuthService } from "../services/auth.service.js";
import type { ProviderSelector } from "../services/provider-selector.js";
import { requireAuth } from "../plugins/authenticate.js";
import { completionSchema, parseBody } from "../validation/schemas.js";

const logger = createLogger("ai-routes");

export type LLMProviderFactory = (
  credential: CredentialHandle,
  model?: string,
  defaults?: LLMRequestOptions
) => LLMProvider;

export interface AiRouteOptions {
  timeoutMs: number;
  providerFactory?: LLMProviderFactory;
}

export function registerAiRoutes(
  app: FastifyInstance,
  authService: AuthService,
  providers: ProviderSelector,
  options: AiRouteOptions
): void {
  const providerFactory = options.providerFactory ?? createLLMProvider;

  app.register(async function scopedRoutes(scoped: FastifyInstance) {
    scoped.addHook("onRequest", app.authenticate);

    scoped.post("/api/v1/ai/complete", async (request: FastifyRequest, reply: FastifyReply) => {
      const body = parseBody(completionSchema, request.body);
      const user = await authService.getProfile(requireAuth(request).sub);

      const credential = providers.resolve(user.preferredAiProvider);
      const llm = providerFactory(credential, undefined, { timeoutMs: options.timeoutMs });

      const requestOptions: LLMRequestOptions = {};
      if (body.system_prompt !== undefined) requestOptions.systemPrompt = body.system_prompt;
      if (body.max_tokens !== undefined) requestOptions.maxTokens = body.max_tokens;

      const response = await llm.generate(body.prompt, requestOptions);

      logger.info(
        { userId: user.id, provider: response.provider, model: response.model, durationMs: response.durationMs },
        "Completion served"
      );

      return reply.send({
        content: response.content,
        provider: response.provider,
        model: response.model,
        usage: {
          prompt_tokens: response.usage.promptTokens,
          completion_tokens: response.usage.completionTokens,
          total_tokens: response.usage.totalTokens,
        },
      });
    });
  });
}
