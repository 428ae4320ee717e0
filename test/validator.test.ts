import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { formatValidationReport } from "../src/eval/report.js";
import { validateSubmission, validateTable } from "../src/eval/validator.js";
import { parseCsv } from "../src/lib/csv.js";

function table(lines: string[]) {
  return parseCsv(["uid;type;request", ...lines].join("\n"));
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

test("a complete ordered submission has no violations", () => {
  const t = table(["1;GET;/v1/exchanges", "2;UNKNOWN;", "3;POST;/v1/sessions"]);
  assert.deepEqual(validateTable(t, [1, 2, 3]), []);
});

test("a missing row is reported with the row count mismatch", () => {
  const ids = range(1, 300).filter((id) => id !== 7);
  const t = table(ids.map((id) => `${id};GET;/v1/exchanges`));
  assert.deepEqual(validateTable(t, range(1, 300)), [
    { code: "missing_row", message: "no row for uid 7", id: 7 },
    { code: "row_count", message: "expected 300 rows, found 299" }
  ]);
});

test("reports every row-level problem without stopping at the first", () => {
  const t = table([
    "1;GET;/v1/exchanges",
    "x;GET;/v1/exchanges",
    "3;FETCH;/v1/exchanges",
    "4;;/v1/exchanges",
    "5;GET;",
    "6;GET;v1/exchanges",
    "6;GET;/v1/exchanges",
    "2;GET;/v1/exchanges"
  ]);
  assert.deepEqual(validateTable(t).map((v) => [v.code, v.line]), [
    ["invalid_id", 3],
    ["invalid_method", 4],
    ["empty_method", 5],
    ["empty_path", 6],
    ["invalid_path", 7],
    ["duplicate_id", 8],
    ["unordered_ids", 9]
  ]);
});

test("unordered ids are reported once", () => {
  const t = table(["3;GET;/a", "1;GET;/b", "2;GET;/c"]);
  assert.deepEqual(validateTable(t).map((v) => v.code), ["unordered_ids"]);
});

test("ids outside the test set are unexpected", () => {
  const t = table(["1;GET;/a", "9;GET;/b"]);
  assert.deepEqual(validateTable(t, [1, 2]).map((v) => [v.code, v.id]), [
    ["missing_row", 2],
    ["unexpected_row", 9]
  ]);
});

test("missing columns are reported by name", () => {
  const t = parseCsv("uid;type\n1;GET\n");
  assert.deepEqual(validateTable(t), [{ code: "missing_column", message: 'missing column "request"' }]);
});

test("an unreadable file is a violation, not an exception", async () => {
  const file = path.join(os.tmpdir(), "bench-does-not-exist", "submission.csv");
  const report = await validateSubmission(file);
  assert.equal(report.ok, false);
  assert.equal(report.rowCount, 0);
  assert.deepEqual(report.violations.map((v) => v.code), ["file_unreadable"]);
});

test("validateSubmission reads the file and the report renders it", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bench-validate-"));
  const file = path.join(dir, "submission.csv");
  await fs.writeFile(file, "uid;type;request\n1;GET;/v1/exchanges\n2;POST;sessions\n", "utf8");

  const bad = await validateSubmission(file, [1, 2]);
  assert.deepEqual(formatValidationReport(bad), [
    `FAILED: ${file} has 1 violation(s)`,
    '  [invalid_path] line 3: request "sessions" does not start with "/"'
  ]);

  await fs.writeFile(file, "uid;type;request\n1;GET;/v1/exchanges\n2;POST;/v1/sessions\n", "utf8");
  const good = await validateSubmission(file, [1, 2]);
  assert.deepEqual(formatValidationReport(good), [`OK: ${file} (2 rows)`]);
  await fs.rm(dir, { recursive: true, force: true });
});
