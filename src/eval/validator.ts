/**
 * SUBMISSION VALIDATOR
 *
 * Runs every structural check over a submission file and returns the full
 * list of violations; nothing fails fast. A file is scorable only when the
 * list is empty.
 */

import { readCsvFile, type CsvTable } from '../lib/csv.js';
import { describeError } from '../lib/errors.js';
import { isHttpMethod, UNKNOWN_METHOD } from '../types/dataset.js';
import { SUBMISSION_HEADER } from '../persistence/submissionStore.js';

export type ViolationCode =
    | 'file_unreadable'
    | 'missing_column'
    | 'invalid_id'
    | 'empty_method'
    | 'invalid_method'
    | 'empty_path'
    | 'invalid_path'
    | 'duplicate_id'
    | 'unordered_ids'
    | 'missing_row'
    | 'unexpected_row'
    | 'row_count';

export type Violation = {
    code: ViolationCode;
    message: string;
    line?: number;
    id?: number;
};

export type ValidationReport = {
    ok: boolean;
    file: string;
    rowCount: number;
    violations: Violation[];
};

export async function validateSubmission(filePath: string, expectedIds?: Iterable<number>): Promise<ValidationReport> {
    let table: CsvTable;
    try {
        table = await readCsvFile(filePath);
    } catch (e) {
        const violations: Violation[] = [{ code: 'file_unreadable', message: `cannot read ${filePath}: ${describeError(e)}` }];
        return { ok: false, file: filePath, rowCount: 0, violations };
    }
    const violations = validateTable(table, expectedIds);
    return { ok: violations.length === 0, file: filePath, rowCount: table.records.length, violations };
}

export function validateTable(table: CsvTable, expectedIds?: Iterable<number>): Violation[] {
    const violations: Violation[] = [];
    for (const col of SUBMISSION_HEADER) {
        if (!table.header.includes(col)) violations.push({ code: 'missing_column', message: `missing column "${col}"` });
    }
    const has = (col: string) => table.header.includes(col);

    const seen = new Set<number>();
    let prevId = -1;
    let orderReported = false;
    for (const { line, values } of table.records) {
        let id: number | undefined;
        if (has('uid')) {
            const raw = (values.uid ?? '').trim();
            if (/^\d+$/.test(raw)) {
                id = Number(raw);
                if (seen.has(id)) violations.push({ code: 'duplicate_id', message: `duplicate uid ${id}`, line, id });
                else if (id < prevId && !orderReported) {
                    violations.push({ code: 'unordered_ids', message: `uid ${id} follows ${prevId}; rows must be in ascending uid order`, line, id });
                    orderReported = true;
                }
                seen.add(id);
                prevId = Math.max(prevId, id);
            } else {
                violations.push({ code: 'invalid_id', message: `uid "${raw}" is not a non-negative integer`, line });
            }
        }
        const method = has('type') ? (values.type ?? '').trim() : undefined;
        if (method !== undefined) {
            if (method === '') violations.push({ code: 'empty_method', message: 'empty type', line, id });
            else if (method !== UNKNOWN_METHOD && !isHttpMethod(method)) {
                violations.push({ code: 'invalid_method', message: `type "${method}" is not an allowed HTTP method`, line, id });
            }
        }
        if (has('request') && method !== UNKNOWN_METHOD) {
            const path = (values.request ?? '').trim();
            if (path === '') violations.push({ code: 'empty_path', message: 'empty request', line, id });
            else if (!path.startsWith('/')) violations.push({ code: 'invalid_path', message: `request "${path}" does not start with "/"`, line, id });
        }
    }

    if (expectedIds !== undefined) {
        const expected = new Set(expectedIds);
        const missing = Array.from(expected).filter((id) => !seen.has(id)).sort((a, b) => a - b);
        for (const id of missing) violations.push({ code: 'missing_row', message: `no row for uid ${id}`, id });
        const extra = Array.from(seen).filter((id) => !expected.has(id)).sort((a, b) => a - b);
        for (const id of extra) violations.push({ code: 'unexpected_row', message: `uid ${id} is not in the test set`, id });
        if (table.records.length !== expected.size) {
            violations.push({ code: 'row_count', message: `expected ${expected.size} rows, found ${table.records.length}` });
        }
    }
    return violations;
}
