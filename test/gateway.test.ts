import test from "node:test";
import assert from "node:assert/strict";
import { NonTransientGatewayError, TransientUnavailableError } from "../src/lib/errors.js";
import { CostMeter } from "../src/llm/costMeter.js";
import { ModelGateway, type AttemptRecord } from "../src/llm/gateway.js";
import { ProviderHttpError, type CompletionRequest, type LLMProvider, type RawCompletion } from "../src/llm/provider.js";
import { createRetryPolicy } from "../src/llm/retryPolicy.js";

const MODEL = "test/model";
const PRICES = { [MODEL]: { prompt: 1, completion: 1 } };
const MILLION = { promptTokens: 1_000_000, completionTokens: 0 };

class ScriptedProvider implements LLMProvider {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: Array<RawCompletion | Error>) {}

  async complete(req: CompletionRequest): Promise<RawCompletion> {
    this.requests.push(req);
    const next = this.script.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

function gateway(provider: LLMProvider, maxAttempts = 4): ModelGateway {
  return new ModelGateway(provider, createRetryPolicy({ maxAttempts, baseMs: 1 }), PRICES, async () => {});
}

test("bills every attempt when transient failures precede a success", async () => {
  const provider = new ScriptedProvider([
    new ProviderHttpError(503, "busy", undefined, MILLION),
    new ProviderHttpError(503, "busy", undefined, MILLION),
    new ProviderHttpError(503, "busy", undefined, MILLION),
    { text: "GET /v1/exchanges", model: MODEL, usage: MILLION }
  ]);
  const meter = new CostMeter();
  const records: AttemptRecord[] = [];
  const out = await gateway(provider).complete("prompt", { model: MODEL, temperature: 0, meter, onAttempt: (r) => records.push(r) });

  assert.equal(out.text, "GET /v1/exchanges");
  assert.equal(out.attempts, 4);
  assert.equal(out.cost, 4);
  assert.equal(meter.total, 4);
  assert.equal(meter.snapshot().billedAttempts, 4);
  assert.deepEqual(records.map((r) => [r.attempt, r.ok, r.status]), [[1, false, 503], [2, false, 503], [3, false, 503], [4, true, undefined]]);
  assert.deepEqual(provider.requests[0]?.messages, [{ role: "user", content: "prompt" }]);
});

test("exhausted retries surface as TransientUnavailableError with the call cost", async () => {
  const provider = new ScriptedProvider([
    new ProviderHttpError(502, "bad gateway", undefined, MILLION),
    new ProviderHttpError(502, "bad gateway")
  ]);
  const meter = new CostMeter();
  await assert.rejects(gateway(provider, 2).complete("p", { model: MODEL, temperature: 0, meter }), (err: unknown) => {
    assert.ok(err instanceof TransientUnavailableError);
    assert.equal(err.attempts, 2);
    assert.equal(err.cost, 1);
    return true;
  });
  assert.deepEqual(meter.snapshot(), { totalCost: 1, attempts: 2, billedAttempts: 1, promptTokens: 1_000_000, completionTokens: 0 });
});

test("authentication failures are not retried and abort as NonTransientGatewayError", async () => {
  const provider = new ScriptedProvider([new ProviderHttpError(401, "invalid key")]);
  await assert.rejects(gateway(provider).complete("p", { model: MODEL, temperature: 0, meter: new CostMeter() }), (err: unknown) => {
    assert.ok(err instanceof NonTransientGatewayError);
    assert.equal(err.status, 401);
    assert.equal(err.message, "LLM API 401: invalid key");
    return true;
  });
  assert.equal(provider.requests.length, 1);
});

test("unexpected errors pass through untouched", async () => {
  const boom = new Error("boom");
  const provider = new ScriptedProvider([boom]);
  await assert.rejects(gateway(provider).complete("p", { model: MODEL, temperature: 0, meter: new CostMeter() }), (err: unknown) => err === boom);
});
