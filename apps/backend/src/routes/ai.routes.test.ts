import test from "node:test";
import assert from "node:assert/strict";
import type { FastifyInstance } from "fastify";
import type { CredentialHandle, LLMProvider, LLMRequestOptions } from "@coachgate/types";
import { ProviderRequestError, UpstreamUnavailableError } from "@coachgate/llm";
import type { LLMProviderFactory } from "./ai.routes.js";
import { createTestApp, TEST_PASSWORD } from "../test-support.js";

interface FactoryCall {
  provider: string;
  secret: string;
  defaults: LLMRequestOptions | undefined;
  prompt?: string;
  options?: LLMRequestOptions;
}

function recordingFactory(generate: LLMProvider["generate"]) {
  const calls: FactoryCall[] = [];
  const factory: LLMProviderFactory = (credential: CredentialHandle, _model, defaults) => {
    const call: FactoryCall = { provider: credential.provider, secret: credential.use((s) => s), defaults };
    calls.push(call);
    return {
      provider: credential.provider,
      async generate(prompt, options) {
        call.prompt = prompt;
        call.options = options;
        return generate(prompt, options);
      },
    };
  };
  return { factory, calls };
}

async function accessTokenFor(app: FastifyInstance, payload: Record<string, unknown>): Promise<string> {
  const response = await app.inject({ method: "POST", url: "/api/v1/auth/register", payload });
  assert.equal(response.statusCode, 201);
  return response.json().access_token;
}

test("completion runs on the system credential of the user's provider", async (t) => {
  const { factory, calls } = recordingFactory(async () => ({
    content: "Use a hash map.",
    provider: "openai",
    model: "gpt-4o-mini",
    usage: { promptTokens: 5, completionTokens: 4, totalTokens: 9 },
    durationMs: 12,
  }));
  const { app } = await createTestApp({ providerFactory: factory });
  t.after(() => app.close());

  const token = await accessTokenFor(app, {
    email: "ai@example.com",
    password: TEST_PASSWORD,
    preferred_ai_provider: "openai",
  });
  const response = await app.inject({
    method: "POST",
    url: "/api/v1/ai/complete",
    headers: { authorization: `Bearer ${token}` },
    payload: { prompt: "How do I find duplicates?", max_tokens: 256 },
  });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), {
    content: "Use a hash map.",
    provider: "openai",
    model: "gpt-4o-mini",
    usage: { prompt_tokens: 5, completion_tokens: 4, total_tokens: 9 },
  });
  assert.deepEqual(calls, [
    {
      provider: "openai",
      secret: "test-openai-key",
      defaults: { timeoutMs: 1000 },
      prompt: "How do I find duplicates?",
      options: { maxTokens: 256 },
    },
  ]);
});

test("an unavailable provider is a 502 the client may retry", async (t) => {
  const { factory } = recordingFactory(async () => {
    throw new UpstreamUnavailableError("gemini", "gemini request timed out after 1000ms");
  });
  const { app } = await createTestApp({ providerFactory: factory });
  t.after(() => app.close());

  const token = await accessTokenFor(app, { email: "slow@example.com", password: TEST_PASSWORD });
  const response = await app.inject({
    method: "POST",
    url: "/api/v1/ai/complete",
    headers: { authorization: `Bearer ${token}` },
    payload: { prompt: "hello" },
  });

  assert.equal(response.statusCode, 502);
  assert.deepEqual(response.json(), {
    detail: "AI provider is temporarily unavailable. Please retry.",
    code: "UPSTREAM_UNAVAILABLE",
  });
});

test("a rejected provider request is a generic 500", async (t) => {
  const { factory } = recordingFactory(async () => {
    throw new ProviderRequestError("gemini", "gemini API error (401): key invalid", 401);
  });
  const { app } = await createTestApp({ providerFactory: factory });
  t.after(() => app.close());

  const token = await accessTokenFor(app, { email: "bad-key@example.com", password: TEST_PASSWORD });
  const response = await app.inject({
    method: "POST",
    url: "/api/v1/ai/complete",
    headers: { authorization: `Bearer ${token}` },
    payload: { prompt: "hello" },
  });

  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.json(), { detail: "Internal server error", code: "INTERNAL_ERROR" });
});

test("completion requires authentication", async (t) => {
  const { factory, calls } = recordingFactory(async () => {
    throw new Error("should not be called");
  });
  const { app } = await createTestApp({ providerFactory: factory });
  t.after(() => app.close());

  const response = await app.inject({ method: "POST", url: "/api/v1/ai/complete", payload: { prompt: "hello" } });

  assert.equal(response.statusCode, 401);
  assert.equal(calls.length, 0);
});
