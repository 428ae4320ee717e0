import test from "node:test";
import assert from "node:assert/strict";
import { TransientUnavailableError } from "../src/lib/errors.js";
import { ProviderHttpError, ProviderNetworkError, ProviderResponseError, ProviderTimeoutError } from "../src/llm/provider.js";
import { createRetryPolicy, exponentialBackoff, isTransientError, withRetry } from "../src/llm/retryPolicy.js";

const noSleep = async (): Promise<void> => {};

test("transient errors are timeouts, network failures, bad bodies and retryable statuses", () => {
  assert.equal(isTransientError(new ProviderTimeoutError(1000)), true);
  assert.equal(isTransientError(new ProviderNetworkError(new Error("ECONNRESET"))), true);
  assert.equal(isTransientError(new ProviderResponseError("no choices")), true);
  for (const status of [408, 409, 425, 429, 500, 502, 503]) {
    assert.equal(isTransientError(new ProviderHttpError(status, "")), true, `status ${status}`);
  }
  for (const status of [400, 401, 403, 404, 422]) {
    assert.equal(isTransientError(new ProviderHttpError(status, "")), false, `status ${status}`);
  }
  assert.equal(isTransientError(new Error("boom")), false);
});

test("exponential backoff doubles and caps", () => {
  const backoff = exponentialBackoff(500, 3000);
  assert.deepEqual([1, 2, 3, 4, 5].map(backoff), [500, 1000, 2000, 3000, 3000]);
});

test("Retry-After overrides the computed delay", () => {
  const policy = createRetryPolicy({ maxAttempts: 4, baseMs: 500 });
  assert.equal(policy.backoffMs(1, new ProviderHttpError(429, "", 7000)), 7000);
  assert.equal(policy.backoffMs(2, new ProviderHttpError(503, "")), 1000);
  assert.equal(policy.backoffMs(1, new ProviderHttpError(429, "", 120_000)), 30_000);
});

test("withRetry returns the first success and reports each retry", async () => {
  const policy = createRetryPolicy({ maxAttempts: 4, baseMs: 10 });
  const retries: Array<[number, number]> = [];
  const slept: number[] = [];
  let calls = 0;
  const out = await withRetry(async (attempt) => {
    calls++;
    if (attempt < 3) throw new ProviderHttpError(503, "busy");
    return "ok";
  }, policy, {
    sleep: async (ms) => {
      slept.push(ms);
    },
    onRetry: (attempt, _err, delay) => retries.push([attempt, delay])
  });
  assert.equal(out, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(retries, [[1, 10], [2, 20]]);
  assert.deepEqual(slept, [10, 20]);
});

test("withRetry rethrows non-retryable errors immediately", async () => {
  let calls = 0;
  const err = new ProviderHttpError(401, "bad key");
  await assert.rejects(
    withRetry(async () => {
      calls++;
      throw err;
    }, createRetryPolicy({ maxAttempts: 4, baseMs: 1 }), { sleep: noSleep }),
    (e: unknown) => e === err
  );
  assert.equal(calls, 1);
});

test("withRetry gives up with TransientUnavailableError after maxAttempts", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(async () => {
      calls++;
      throw new ProviderTimeoutError(5);
    }, createRetryPolicy({ maxAttempts: 3, baseMs: 1 }), { sleep: noSleep }),
    (e: unknown) => {
      assert.ok(e instanceof TransientUnavailableError);
      assert.equal(e.attempts, 3);
      assert.equal(e.message, "model unavailable after 3 attempt(s): LLM request timed out after 5ms");
      return true;
    }
  );
  assert.equal(calls, 3);
});

test("withRetry stops retrying once the signal is aborted", async () => {
  const controller = new AbortController();
  let calls = 0;
  await assert.rejects(
    withRetry(async () => {
      calls++;
      controller.abort();
      throw new ProviderHttpError(503, "busy");
    }, createRetryPolicy({ maxAttempts: 5, baseMs: 1 }), { sleep: noSleep, signal: controller.signal }),
    ProviderHttpError
  );
  assert.equal(calls, 1);
});
