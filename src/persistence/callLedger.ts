/**
 * CALL LEDGER
 *
 * Append-only JSON Lines journal of generation runs and of every model
 * attempt made during them (tokens, cost, outcome, raw text). Used for cost
 * audits and for replaying what the model answered; scoring never reads it.
 *
 * Each line is `{ ts, type, data }` with type `run_started`, `attempt` or
 * `run_finished`. Writes are queued in call order; flush() waits for them
 * and surfaces the first write error.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'node:path';
import createDebug from 'debug';
import { z } from 'zod';
import { describeError, errorCode } from '../lib/errors.js';
import type { AttemptRecord } from '../llm/gateway.js';

const log = createDebug('bench:ledger');

export type RunStatus = 'running' | 'completed' | 'cancelled' | 'aborted';

export type RunInfo = {
    model: string;
    numExamples: number;
    seed: number;
    testCount: number;
};

export type StoredRun = RunInfo & {
    runId: string;
    startedAt: number;
    finishedAt: number | null;
    status: RunStatus;
};

export type StoredAttempt = {
    testId: number;
    attempt: number;
    ok: boolean;
    status: number | null;
    cost: number;
    text: string | null;
    error: string | null;
};

const RunStartedSchema = z.object({
    ts: z.number(),
    type: z.literal('run_started'),
    data: z.object({
        runId: z.string(),
        model: z.string(),
        numExamples: z.number(),
        seed: z.number(),
        testCount: z.number()
    })
});

const AttemptSchema = z.object({
    ts: z.number(),
    type: z.literal('attempt'),
    data: z.object({
        runId: z.string(),
        testId: z.number(),
        attempt: z.number(),
        ok: z.boolean(),
        model: z.string(),
        status: z.number().optional(),
        promptTokens: z.number().optional(),
        completionTokens: z.number().optional(),
        cost: z.number(),
        durationMs: z.number(),
        text: z.string().optional(),
        error: z.string().optional()
    })
});

const RunFinishedSchema = z.object({
    ts: z.number(),
    type: z.literal('run_finished'),
    data: z.object({
        runId: z.string(),
        status: z.enum(['completed', 'cancelled', 'aborted']),
        summary: z.unknown()
    })
});

const EntrySchema = z.discriminatedUnion('type', [RunStartedSchema, AttemptSchema, RunFinishedSchema]);
type Entry = z.infer<typeof EntrySchema>;

// A crash mid-append can leave a torn last line
function parseLine(line: string): Entry | undefined {
    try {
        const parsed = EntrySchema.safeParse(JSON.parse(line));
        return parsed.success ? parsed.data : undefined;
    } catch {
        return undefined;
    }
}

export class CallLedger {
    private pending: Promise<void> = Promise.resolve();
    private writeError: unknown;

    constructor(private readonly filePath: string) { }

    startRun(info: RunInfo): string {
        const runId = randomUUID();
        this.enqueue({ ts: Date.now(), type: 'run_started', data: { runId, ...info } });
        log('run %s started (%s, %d tests)', runId, info.model, info.testCount);
        return runId;
    }

    recordAttempt(runId: string, testId: number, rec: AttemptRecord): void {
        this.enqueue({
            ts: Date.now(),
            type: 'attempt',
            data: {
                runId,
                testId,
                attempt: rec.attempt,
                ok: rec.ok,
                model: rec.model,
                status: rec.status,
                promptTokens: rec.usage?.promptTokens,
                completionTokens: rec.usage?.completionTokens,
                cost: rec.cost,
                durationMs: rec.durationMs,
                text: rec.text,
                error: rec.error
            }
        });
    }

    async finishRun(runId: string, status: Exclude<RunStatus, 'running'>, summary: unknown): Promise<void> {
        this.enqueue({ ts: Date.now(), type: 'run_finished', data: { runId, status, summary } });
        await this.flush();
        log('run %s %s', runId, status);
    }

    /** Waits for queued writes; rethrows the first failure since the last flush. */
    async flush(): Promise<void> {
        await this.pending;
        const err = this.writeError;
        this.writeError = undefined;
        if (err !== undefined) throw err;
    }

    async runs(): Promise<StoredRun[]> {
        const byId = new Map<string, StoredRun>();
        for (const entry of await this.entries()) {
            if (entry.type === 'run_started') {
                byId.set(entry.data.runId, { ...entry.data, startedAt: entry.ts, finishedAt: null, status: 'running' });
            } else if (entry.type === 'run_finished') {
                const run = byId.get(entry.data.runId);
                if (run) byId.set(run.runId, { ...run, finishedAt: entry.ts, status: entry.data.status });
            }
        }
        return Array.from(byId.values());
    }

    async runStatus(runId: string): Promise<RunStatus | undefined> {
        return (await this.runs()).find((r) => r.runId === runId)?.status;
    }

    async attempts(runId: string, testId?: number): Promise<StoredAttempt[]> {
        const out: StoredAttempt[] = [];
        for (const entry of await this.entries()) {
            if (entry.type !== 'attempt' || entry.data.runId !== runId) continue;
            const d = entry.data;
            if (testId !== undefined && d.testId !== testId) continue;
            out.push({
                testId: d.testId,
                attempt: d.attempt,
                ok: d.ok,
                status: d.status ?? null,
                cost: d.cost,
                text: d.text ?? null,
                error: d.error ?? null
            });
        }
        return out.sort((a, b) => a.testId - b.testId || a.attempt - b.attempt);
    }

    async totalCost(runId: string): Promise<number> {
        return (await this.attempts(runId)).reduce((sum, a) => sum + a.cost, 0);
    }

    private enqueue(entry: Entry): void {
        const line = JSON.stringify(entry) + '\n';
        this.pending = this.pending
            .then(async () => {
                await fs.mkdir(path.dirname(this.filePath), { recursive: true });
                await fs.appendFile(this.filePath, line, { encoding: 'utf8' });
            })
            .catch((e: unknown) => {
                log('write to %s failed: %s', this.filePath, describeError(e));
                if (this.writeError === undefined) this.writeError = e;
            });
    }

    private async entries(): Promise<Entry[]> {
        await this.flush();
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf8');
        } catch (e) {
            if (errorCode(e) === 'ENOENT') return [];
            throw e;
        }
        const out: Entry[] = [];
        for (const line of content.split('\n')) {
            if (line.trim() === '') continue;
            const entry = parseLine(line);
            if (entry) out.push(entry);
            else log('skipping malformed ledger line');
        }
        return out;
    }
}
