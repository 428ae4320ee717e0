import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { DataError } from "../src/lib/errors.js";
import { SubmissionStore } from "../src/persistence/submissionStore.js";
import type { Prediction } from "../src/types/dataset.js";

function prediction(id: number, method: Prediction["method"], p: string): Prediction {
  return { id, method, path: p, rawResponse: `${method} ${p}`, cost: 0.001 };
}

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "bench-store-"));
}

test("lists predictions in ascending id order", () => {
  const store = new SubmissionStore();
  store.append(prediction(3, "GET", "/v1/exchanges"));
  store.append(prediction(1, "POST", "/v1/sessions"));
  store.append(prediction(2, "UNKNOWN", ""));
  assert.deepEqual(store.list().map((p) => p.id), [1, 2, 3]);
  assert.equal(store.size, 3);
});

test("rejects a second prediction for the same id", () => {
  const store = new SubmissionStore();
  store.append(prediction(1, "GET", "/v1/exchanges"));
  assert.throws(() => store.append(prediction(1, "POST", "/v1/sessions")), /uid 1 already recorded/);
});

test("writes a uid;type;request table and reads it back", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "submission.csv");
  const store = new SubmissionStore();
  store.append(prediction(2, "GET", "/v1/instruments/SBER@MISX/quotes/latest"));
  store.append(prediction(0, "UNKNOWN", "ignored"));
  store.append(prediction(1, "DELETE", "/v1/accounts/A1/orders/77"));

  assert.equal(await store.writeAll(file), 3);
  assert.equal(
    await fs.readFile(file, "utf8"),
    "uid;type;request\n0;UNKNOWN;\n1;DELETE;/v1/accounts/A1/orders/77\n2;GET;/v1/instruments/SBER@MISX/quotes/latest\n"
  );
  assert.deepEqual(await SubmissionStore.readAll(file), [
    { id: 0, method: "UNKNOWN", path: "" },
    { id: 1, method: "DELETE", path: "/v1/accounts/A1/orders/77" },
    { id: 2, method: "GET", path: "/v1/instruments/SBER@MISX/quotes/latest" }
  ]);
  assert.deepEqual(await fs.readdir(dir), ["submission.csv"]);
  await fs.rm(dir, { recursive: true, force: true });
});

test("readAll rejects files without the submission columns", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "bad.csv");
  await fs.writeFile(file, "id;method\n1;GET\n", "utf8");
  await assert.rejects(SubmissionStore.readAll(file), DataError);
  await fs.rm(dir, { recursive: true, force: true });
});

test("readAll names the line of an invalid row", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "bad.csv");
  await fs.writeFile(file, "uid;type;request\n1;GET;/v1/exchanges\nx;GET;/v1/exchanges\n", "utf8");
  await assert.rejects(SubmissionStore.readAll(file), (err: unknown) => {
    assert.ok(err instanceof DataError);
    assert.equal(err.line, 3);
    return true;
  });
  await fs.rm(dir, { recursive: true, force: true });
});
