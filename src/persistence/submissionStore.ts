/**
 * SUBMISSION STORE
 *
 * Collects one prediction per test id and persists them as a
 * `uid;type;request` table in ascending id order. Files are written to a
 * temp sibling and renamed, so a crash mid-write never leaves a truncated
 * submission behind.
 */

import createDebug from 'debug';
import { formatCsv, readCsvFile, writeFileAtomic } from '../lib/csv.js';
import { DataError } from '../lib/errors.js';
import { SubmissionRowSchema, UNKNOWN_METHOD, toSubmissionRow, type Prediction, type SubmissionRow } from '../types/dataset.js';

const log = createDebug('bench:submission');

export const SUBMISSION_HEADER = ['uid', 'type', 'request'] as const;

export class SubmissionStore {
    private readonly byId = new Map<number, Prediction>();

    append(prediction: Prediction): void {
        if (this.byId.has(prediction.id)) throw new Error(`prediction for uid ${prediction.id} already recorded`);
        this.byId.set(prediction.id, prediction);
    }

    get size(): number {
        return this.byId.size;
    }

    /** Predictions in ascending id order. */
    list(): Prediction[] {
        return Array.from(this.byId.values()).sort((a, b) => a.id - b.id);
    }

    async writeAll(filePath: string): Promise<number> {
        const rows = this.list().map((p) => {
            const r = toSubmissionRow(p);
            return [String(r.id), r.method, r.method === UNKNOWN_METHOD ? '' : r.path];
        });
        await writeFileAtomic(filePath, formatCsv(SUBMISSION_HEADER, rows));
        log('wrote %d rows to %s', rows.length, filePath);
        return rows.length;
    }

    static async readAll(filePath: string): Promise<SubmissionRow[]> {
        const table = await readCsvFile(filePath);
        const missing = SUBMISSION_HEADER.filter((c) => !table.header.includes(c));
        if (missing.length > 0) throw new DataError(`missing column(s): ${missing.join(', ')}`, filePath);
        return table.records.map((r) => {
            const parsed = SubmissionRowSchema.safeParse({
                id: r.values.uid?.trim(),
                method: r.values.type?.trim(),
                path: r.values.request?.trim() ?? ''
            });
            if (!parsed.success) throw new DataError('invalid submission row', filePath, r.line);
            return parsed.data;
        });
    }
}
