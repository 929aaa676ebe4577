import test from "node:test";
import assert from "node:assert/strict";
import { inspect } from "node:util";
import { createCredentialStore } from "./credential-store.js";
import { createProviderSelector } from "./provider-selector.js";
import { UnknownProviderError } from "../errors.js";

const credentials = { gemini: "test-gemini-key", openai: "test-openai-key" };

test("resolves a configured provider case-insensitively", () => {
  const selector = createProviderSelector(createCredentialStore({ credentials, defaultProvider: "gemini" }));

  assert.equal(selector.resolve("OpenAI ").provider, "openai");
});

test("falls back to the default for missing, unknown and unconfigured providers", () => {
  const selector = createProviderSelector(createCredentialStore({ credentials, defaultProvider: "gemini" }));

  assert.equal(selector.resolve().provider, "gemini");
  assert.equal(selector.resolve(null).provider, "gemini");
  assert.equal(selector.resolve("claude").provider, "gemini");
  assert.equal(selector.resolve("groq").provider, "gemini");
});

test("uses the first configured provider when the configured default has no key", () => {
  const store = createCredentialStore({ credentials: { openai: "test-openai-key", groq: "test-groq-key" }, defaultProvider: "gemini" });

  assert.equal(store.defaultProvider, "openai");
  assert.deepEqual(store.providers, ["openai", "groq"]);
});

test("ignores blank secrets", () => {
  const store = createCredentialStore({ credentials: { gemini: "   ", groq: "test-groq-key" }, defaultProvider: "gemini" });

  assert.equal(store.get("gemini"), null);
  assert.equal(store.defaultProvider, "groq");
});

test("fails with an unknown provider error when nothing is configured", () => {
  const selector = createProviderSelector(createCredentialStore({ credentials: {}, defaultProvider: "gemini" }));

  assert.throws(() => selector.resolve("gemini"), UnknownProviderError);
  assert.deepEqual(selector.status(), { configured: [], defaultProvider: null });
});

test("lends the secret only through use()", () => {
  const store = createCredentialStore({ credentials, defaultProvider: "gemini" });
  const handle = store.get("gemini");
  assert.ok(handle);

  assert.equal(handle.use((secret) => secret), "test-gemini-key");
  assert.equal(JSON.stringify(handle), '{"provider":"gemini","secret":"[REDACTED]"}');
  assert.equal(inspect(handle), "CredentialHandle(gemini, [REDACTED])");
  assert.equal(JSON.stringify({ credential: handle }).includes("test-gemini-key"), false);
});

test("store and its provider list are frozen", () => {
  const store = createCredentialStore({ credentials, defaultProvider: "gemini" });

  assert.equal(Object.isFrozen(store), true);
  assert.equal(Object.isFrozen(store.providers), true);
});
