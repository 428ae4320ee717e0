import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig, requireApiKey } from "../src/config/index.js";
import { ConfigError } from "../src/lib/errors.js";

test("applies defaults when the environment is empty", () => {
  const cfg = loadConfig({});
  assert.equal(cfg.llm.baseUrl, "https://openrouter.ai/api/v1");
  assert.equal(cfg.llm.model, "openai/gpt-4o-mini");
  assert.equal(cfg.llm.temperature, 0);
  assert.equal(cfg.llm.maxAttempts, 4);
  assert.equal(cfg.llm.concurrency, 4);
  assert.equal(cfg.prompt.seed, 42);
  assert.equal(cfg.ledgerPath, "data/ledger/calls.jsonl");
  assert.equal(cfg.llm.apiKey, undefined);
});

test("reads overrides and trims the trailing slash of the base url", () => {
  const cfg = loadConfig({
    OPENROUTER_API_KEY: "test-secret",
    OPENROUTER_BASE: "http://localhost:8080/v1/",
    LLM_CONCURRENCY: "8",
    LLM_TEMPERATURE: "0.3",
    FEWSHOT_SEED: "7"
  });
  assert.equal(cfg.llm.baseUrl, "http://localhost:8080/v1");
  assert.equal(cfg.llm.concurrency, 8);
  assert.equal(cfg.llm.temperature, 0.3);
  assert.equal(cfg.prompt.seed, 7);
  assert.equal(requireApiKey(cfg), "test-secret");
});

test("treats empty strings as unset", () => {
  const cfg = loadConfig({ OPENROUTER_MODEL: "", LLM_MAX_TOKENS: "" });
  assert.equal(cfg.llm.model, "openai/gpt-4o-mini");
  assert.equal(cfg.llm.maxTokens, 200);
});

test("rejects invalid values with ConfigError", () => {
  assert.throws(() => loadConfig({ LLM_CONCURRENCY: "0" }), ConfigError);
  assert.throws(() => loadConfig({ LLM_TIMEOUT_MS: "soon" }), ConfigError);
});

test("requireApiKey fails without a key", () => {
  assert.throws(() => requireApiKey(loadConfig({})), /OPENROUTER_API_KEY is required/);
});
