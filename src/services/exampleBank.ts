/**
 * EXAMPLE BANK
 *
 * Labeled (question → method, path) rows from the training file, used as
 * few-shot demonstrations. Selection is seeded so a run's prompts can be
 * reproduced exactly.
 */

import createDebug from 'debug';
import { readCsvFile, type CsvTable } from '../lib/csv.js';
import { DataError, describeError, errorCode } from '../lib/errors.js';
import { seededShuffle } from '../lib/random.js';
import { ExampleSchema, HTTP_METHODS, type Example, type HttpMethod } from '../types/dataset.js';

const log = createDebug('bench:examples');

const REQUIRED_COLUMNS = ['question', 'type', 'request'] as const;

export class ExampleBank {
    private readonly notes: string[] = [];

    constructor(private readonly examples: readonly Example[]) { }

    static async load(filePath: string): Promise<ExampleBank> {
        let table: CsvTable;
        try {
            table = await readCsvFile(filePath);
        } catch (e) {
            throw new DataError(`cannot read training file (${errorCode(e) ?? describeError(e)})`, filePath);
        }
        return ExampleBank.fromTable(table, filePath);
    }

    static fromTable(table: CsvTable, source = '<memory>'): ExampleBank {
        const missing = REQUIRED_COLUMNS.filter((c) => !table.header.includes(c));
        if (missing.length > 0) throw new DataError(`missing column(s): ${missing.join(', ')}`, source);
        const examples = table.records.map((r) => {
            const parsed = ExampleSchema.safeParse({
                question: r.values.question?.trim(),
                method: r.values.type?.trim().toUpperCase(),
                path: r.values.request?.trim()
            });
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                throw new DataError(`invalid example: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`, source, r.line);
            }
            return parsed.data;
        });
        log('loaded %d examples from %s', examples.length, source);
        return new ExampleBank(examples);
    }

    get size(): number {
        return this.examples.length;
    }

    get all(): readonly Example[] {
        return this.examples;
    }

    /** Messages recorded by the last calls to select(), e.g. clamped sizes. */
    get diagnostics(): readonly string[] {
        return this.notes;
    }

    /**
     * Picks n examples. Every method present in the bank is represented once
     * (while n allows), the rest is filled in seeded-shuffle order.
     */
    select(n: number, seed: number): Example[] {
        let count = Math.max(0, Math.floor(n));
        if (count > this.examples.length) {
            const note = `requested ${count} examples, bank holds ${this.examples.length}; using ${this.examples.length}`;
            this.notes.push(note);
            log(note);
            count = this.examples.length;
        }
        if (count === 0) return [];

        const order = seededShuffle(this.examples.map((_, i) => i), seed);
        const picked = new Set<number>();
        const byMethod = new Map<HttpMethod, number>();
        for (const idx of order) {
            const ex = this.examples[idx];
            if (ex && !byMethod.has(ex.method)) byMethod.set(ex.method, idx);
        }
        for (const method of HTTP_METHODS) {
            const idx = byMethod.get(method);
            if (idx !== undefined && picked.size < count) picked.add(idx);
        }
        for (const idx of order) {
            if (picked.size >= count) break;
            picked.add(idx);
        }
        const out: Example[] = [];
        for (const idx of order) {
            const ex = this.examples[idx];
            if (ex && picked.has(idx)) out.push(ex);
        }
        return out;
    }
}
