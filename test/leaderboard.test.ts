import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { evaluateLeaderboard, toScore } from "../src/eval/leaderboard.js";
import type { ReferenceRow } from "../src/types/dataset.js";

const publicRefs: ReferenceRow[] = [
  { id: 1, method: "GET", path: "/v1/exchanges" },
  { id: 2, method: "POST", path: "/v1/sessions" }
];

const privateRefs: ReferenceRow[] = [
  { id: 3, method: "GET", path: "/v1/assets/SBER@MISX" },
  { id: 4, method: "DELETE", path: "/v1/accounts/A1/orders/77" }
];

async function withSubmission(content: string, fn: (file: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bench-leaderboard-"));
  const file = path.join(dir, "submission.csv");
  await fs.writeFile(file, content, "utf8");
  try {
    await fn(file);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("accuracy is reported as a two-decimal percentage", () => {
  assert.equal(toScore(1), 100);
  assert.equal(toScore(0.5), 50);
  assert.equal(toScore(2 / 3), 66.67);
  assert.equal(toScore(0), 0);
});

test("scores the public and private splits separately", async () => {
  const content = [
    "uid;type;request",
    "1;GET;/v1/exchanges",
    "2;GET;/v1/sessions",
    "3;GET;/v1/assets/SBER@MISX",
    "4;DELETE;/v1/accounts/A1/orders/77"
  ].join("\n");
  await withSubmission(content, async (file) => {
    const result = await evaluateLeaderboard(file, publicRefs, privateRefs);
    assert.equal(result.validation.ok, true);
    assert.equal(result.publicScore, 50);
    assert.equal(result.privateScore, 100);
    assert.equal(result.public?.correctCount, 1);
    assert.equal(result.private?.totalCount, 2);
  });
});

test("a submission missing a private uid scores zero on both splits", async () => {
  const content = ["uid;type;request", "1;GET;/v1/exchanges", "2;POST;/v1/sessions", "3;GET;/v1/assets/SBER@MISX"].join("\n");
  await withSubmission(content, async (file) => {
    const result = await evaluateLeaderboard(file, publicRefs, privateRefs);
    assert.equal(result.validation.ok, false);
    assert.equal(result.publicScore, 0);
    assert.equal(result.privateScore, 0);
    assert.equal(result.public, undefined);
    assert.deepEqual(result.validation.violations.map((v) => v.code), ["missing_row", "row_count"]);
  });
});

test("uids outside both splits fail validation", async () => {
  const content = [
    "uid;type;request",
    "1;GET;/v1/exchanges",
    "2;POST;/v1/sessions",
    "3;GET;/v1/assets/SBER@MISX",
    "4;DELETE;/v1/accounts/A1/orders/77",
    "5;GET;/v1/exchanges"
  ].join("\n");
  await withSubmission(content, async (file) => {
    const result = await evaluateLeaderboard(file, publicRefs, privateRefs);
    assert.deepEqual(result.validation.violations.map((v) => [v.code, v.id]), [["unexpected_row", 5], ["row_count", undefined]]);
  });
});
