/**
 * Loaders for the held-out test questions and the reference answer file.
 * Both abort with DataError on the first malformed row: a broken input
 * file must stop a run before any model call is made.
 */

import { readCsvFile, type CsvTable } from '../lib/csv.js';
import { DataError, describeError, errorCode } from '../lib/errors.js';
import { ReferenceRowSchema, TestCaseSchema, type ReferenceRow, type TestCase } from '../types/dataset.js';

async function readTable(filePath: string, what: string): Promise<CsvTable> {
    try {
        return await readCsvFile(filePath);
    } catch (e) {
        throw new DataError(`cannot read ${what} (${errorCode(e) ?? describeError(e)})`, filePath);
    }
}

function requireColumns(table: CsvTable, columns: readonly string[], source: string): void {
    const missing = columns.filter((c) => !table.header.includes(c));
    if (missing.length > 0) throw new DataError(`missing column(s): ${missing.join(', ')}`, source);
}

function assertUniqueIds(ids: Array<{ id: number; line: number }>, source: string): void {
    const seen = new Set<number>();
    for (const { id, line } of ids) {
        if (seen.has(id)) throw new DataError(`duplicate uid ${id}`, source, line);
        seen.add(id);
    }
}

export async function loadTestCases(filePath: string): Promise<TestCase[]> {
    const table = await readTable(filePath, 'test file');
    requireColumns(table, ['uid', 'question'], filePath);
    const rows = table.records.map((r) => {
        const parsed = TestCaseSchema.safeParse({ id: r.values.uid?.trim(), question: r.values.question?.trim() });
        if (!parsed.success) throw new DataError('invalid test row (uid must be an integer, question non-empty)', filePath, r.line);
        return { ...parsed.data, line: r.line };
    });
    assertUniqueIds(rows, filePath);
    return rows.map(({ id, question }) => ({ id, question }));
}

export async function loadReferences(filePath: string): Promise<ReferenceRow[]> {
    const table = await readTable(filePath, 'reference file');
    requireColumns(table, ['uid', 'type', 'request'], filePath);
    const rows = table.records.map((r) => {
        const parsed = ReferenceRowSchema.safeParse({
            id: r.values.uid?.trim(),
            method: r.values.type?.trim(),
            path: r.values.request?.trim()
        });
        if (!parsed.success) throw new DataError('invalid reference row', filePath, r.line);
        return { ...parsed.data, line: r.line };
    });
    assertUniqueIds(rows, filePath);
    return rows.map(({ id, method, path }) => ({ id, method, path }));
}
