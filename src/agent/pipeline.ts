/**
 * SUBMISSION PIPELINE
 *
 * Drives one generation run end to end:
 * - few-shot selection and prompt assembly for every test question, up front,
 *   so data and prompt-size errors surface before any model call
 * - bounded-concurrency model calls through the gateway
 * - parsing of each answer into a prediction, UNKNOWN on row-level failure
 * - cost accounting and the run summary
 *
 * Run-level failures (non-transient gateway errors, unexpected errors) stop
 * the pool and propagate; nothing is written for the unprocessed rest.
 */

import createDebug from 'debug';
import { describeError, TransientUnavailableError } from '../lib/errors.js';
import { runPool } from '../lib/workerPool.js';
import { CostMeter, type CostSnapshot } from '../llm/costMeter.js';
import type { AttemptRecord, ModelGateway } from '../llm/gateway.js';
import type { CallLedger } from '../persistence/callLedger.js';
import type { SubmissionStore } from '../persistence/submissionStore.js';
import type { PromptBuilder } from '../prompts/fewShot.js';
import type { ExampleBank } from '../services/exampleBank.js';
import { UNKNOWN_METHOD, type Prediction, type TestCase } from '../types/dataset.js';
import { parseResponse } from './responseParser.js';

const log = createDebug('bench:pipeline');

export type PipelineOptions = {
    numExamples: number;
    seed: number;
    model: string;
    temperature: number;
    maxTokens?: number;
    concurrency: number;
    signal?: AbortSignal;
    onProgress?: (done: number, total: number, cost: number) => void;
};

export type RowFailure = { id: number; reason: string };

export type RunSummary = {
    total: number;
    completed: number;
    totalCost: number;
    averageCost: number;
    cost: CostSnapshot;
    methodCounts: Record<string, number>;
    unknownCount: number;
    failures: RowFailure[];
};

export type RunResult = {
    runId?: string;
    cancelled: boolean;
    summary: RunSummary;
};

export function summarize(predictions: readonly Prediction[], total: number, cost: CostSnapshot, failures: readonly RowFailure[]): RunSummary {
    const methodCounts: Record<string, number> = {};
    for (const p of predictions) methodCounts[p.method] = (methodCounts[p.method] ?? 0) + 1;
    return {
        total,
        completed: predictions.length,
        totalCost: cost.totalCost,
        averageCost: predictions.length > 0 ? cost.totalCost / predictions.length : 0,
        cost,
        methodCounts,
        unknownCount: methodCounts[UNKNOWN_METHOD] ?? 0,
        failures: failures.slice().sort((a, b) => a.id - b.id)
    };
}

export class SubmissionPipeline {
    constructor(
        private readonly bank: ExampleBank,
        private readonly builder: PromptBuilder,
        private readonly gateway: ModelGateway,
        private readonly store: SubmissionStore,
        private readonly ledger?: CallLedger
    ) { }

    async run(testCases: readonly TestCase[], opts: PipelineOptions): Promise<RunResult> {
        const examples = this.bank.select(opts.numExamples, opts.seed);
        log('using %d few-shot examples (seed %d)', examples.length, opts.seed);
        const jobs = testCases.map((tc) => ({ tc, prompt: this.builder.build(examples, tc.question) }));

        const meter = new CostMeter();
        const failures: RowFailure[] = [];
        const runId = this.ledger?.startRun({ model: opts.model, numExamples: examples.length, seed: opts.seed, testCount: testCases.length });
        let done = 0;

        const processOne = async (job: { tc: TestCase; prompt: string }, _idx: number, signal: AbortSignal): Promise<Prediction> => {
            const { tc, prompt } = job;
            const onAttempt = runId !== undefined && this.ledger
                ? (rec: AttemptRecord) => this.ledger?.recordAttempt(runId, tc.id, rec)
                : undefined;
            let prediction: Prediction;
            try {
                const res = await this.gateway.complete(prompt, {
                    model: opts.model,
                    temperature: opts.temperature,
                    maxTokens: opts.maxTokens,
                    meter,
                    signal,
                    onAttempt
                });
                const parsed = parseResponse(res.text);
                if (parsed.ok) {
                    prediction = { id: tc.id, method: parsed.method, path: parsed.path, rawResponse: res.text, cost: res.cost };
                } else {
                    log('uid %d: unparseable answer (%s): %o', tc.id, parsed.reason, res.text);
                    failures.push({ id: tc.id, reason: `parse: ${parsed.reason}` });
                    prediction = { id: tc.id, method: UNKNOWN_METHOD, path: '', rawResponse: res.text, cost: res.cost };
                }
            } catch (e) {
                if (!(e instanceof TransientUnavailableError)) throw e;
                log('uid %d: %s', tc.id, e.message);
                failures.push({ id: tc.id, reason: `unavailable: ${describeError(e.cause)}` });
                prediction = { id: tc.id, method: UNKNOWN_METHOD, path: '', rawResponse: '', cost: e.cost };
            }
            this.store.append(prediction);
            done++;
            opts.onProgress?.(done, jobs.length, meter.total);
            return prediction;
        };

        let cancelled: boolean;
        try {
            const outcome = await runPool(jobs, processOne, { concurrency: opts.concurrency, signal: opts.signal });
            cancelled = outcome.cancelled;
        } catch (e) {
            const summary = summarize(this.store.list(), testCases.length, meter.snapshot(), failures);
            if (runId !== undefined && this.ledger) {
                // A journal failure here is only logged; the run error is rethrown
                await this.ledger.finishRun(runId, 'aborted', { ...summary, error: describeError(e) })
                    .catch((le: unknown) => log('ledger: %s', describeError(le)));
            }
            throw e;
        }

        const summary = summarize(this.store.list(), testCases.length, meter.snapshot(), failures);
        if (runId !== undefined) await this.ledger?.finishRun(runId, cancelled ? 'cancelled' : 'completed', summary);
        log('run finished: %d/%d predictions, $%s', summary.completed, summary.total, summary.totalCost.toFixed(4));
        return { runId, cancelled, summary };
    }
}
