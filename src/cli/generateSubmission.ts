#!/usr/bin/env node
/**
 * GENERATE SUBMISSION CLI TOOL
 *
 * Translates every question of the test file into an HTTP request with
 * the few-shot model pipeline and writes the submission table.
 *
 * Usage: tsx src/cli/generateSubmission.ts [--test-file PATH] [--train-file PATH]
 *        [--output-file PATH] [--num-examples N] [--seed N] [--concurrency N] [--no-ledger]
 *
 * Exit codes: 0 done, 1 aborted (bad data/config, non-transient model error),
 * 130 interrupted (partial file written, it will not pass validation).
 */

import 'dotenv/config';
import { Command } from 'commander';
import createDebug from 'debug';
import { SubmissionPipeline, type RunSummary } from '../agent/pipeline.js';
import { loadConfig, requireApiKey } from '../config/index.js';
import { parseIntArg } from '../lib/cliArgs.js';
import { formatDurationMs, formatUsd } from '../lib/format.js';
import { ModelGateway } from '../llm/gateway.js';
import { OpenRouterProvider } from '../llm/provider.js';
import { createRetryPolicy } from '../llm/retryPolicy.js';
import { CallLedger } from '../persistence/callLedger.js';
import { SubmissionStore } from '../persistence/submissionStore.js';
import { loadApiCatalog } from '../prompts/apiCatalog.js';
import { PromptBuilder } from '../prompts/fewShot.js';
import { loadTestCases } from '../services/datasets.js';
import { ExampleBank } from '../services/exampleBank.js';

const log = createDebug('bench:generate');

type Options = {
    testFile: string;
    trainFile: string;
    outputFile: string;
    numExamples: number;
    seed?: number;
    concurrency?: number;
    ledger: boolean;
};

function printSummary(summary: RunSummary): void {
    console.log(`\nPredictions: ${summary.completed}/${summary.total}`);
    console.log(`Total cost: ${formatUsd(summary.totalCost)} (${summary.cost.attempts} model calls)`);
    console.log(`Average cost per question: ${formatUsd(summary.averageCost, 6)}`);
    console.log(`UNKNOWN predictions: ${summary.unknownCount}`);
    console.log('Requests by method:');
    for (const [method, count] of Object.entries(summary.methodCounts).sort(([a], [b]) => a.localeCompare(b))) {
        console.log(`  ${method}: ${count}`);
    }
    for (const f of summary.failures) console.log(`  uid ${f.id}: ${f.reason}`);
}

async function main(): Promise<number> {
    const program = new Command()
        .name('generate-submission')
        .description('Generate submission.csv from test.csv with a few-shot prompted model')
        .option('--test-file <path>', 'test questions (uid;question)', 'data/processed/test.csv')
        .option('--train-file <path>', 'labeled examples (question;type;request)', 'data/processed/train.csv')
        .option('--output-file <path>', 'submission to write', 'data/processed/submission.csv')
        .option('--num-examples <n>', 'few-shot examples per prompt', parseIntArg(0), 10)
        .option('--seed <n>', 'example selection seed (default: FEWSHOT_SEED)', parseIntArg(0))
        .option('--concurrency <n>', 'parallel model calls (default: LLM_CONCURRENCY)', parseIntArg(1))
        .option('--no-ledger', 'do not journal model calls')
        .parse(process.argv);
    const opts = program.opts<Options>();

    const cfg = loadConfig();
    const seed = opts.seed ?? cfg.prompt.seed;

    const bank = await ExampleBank.load(opts.trainFile);
    const testCases = await loadTestCases(opts.testFile);
    console.log(`Loaded ${bank.size} examples from ${opts.trainFile}, ${testCases.length} questions from ${opts.testFile}`);
    console.log(`Model: ${cfg.llm.model}`);

    const builder = new PromptBuilder({ catalog: loadApiCatalog(), maxChars: cfg.prompt.maxChars });
    const provider = new OpenRouterProvider({ apiKey: requireApiKey(cfg), baseUrl: cfg.llm.baseUrl, timeoutMs: cfg.llm.timeoutMs });
    const gateway = new ModelGateway(provider, createRetryPolicy({ maxAttempts: cfg.llm.maxAttempts, baseMs: cfg.llm.backoffMs }));
    const store = new SubmissionStore();
    const ledger = opts.ledger ? new CallLedger(cfg.ledgerPath) : undefined;

    const controller = new AbortController();
    const onSigint = () => {
        console.error('\nInterrupted: cancelling in-flight questions, no new ones will start');
        controller.abort(new Error('interrupted'));
    };
    process.once('SIGINT', onSigint);

    const started = Date.now();
    try {
        const result = await new SubmissionPipeline(bank, builder, gateway, store, ledger).run(testCases, {
            numExamples: opts.numExamples,
            seed,
            model: cfg.llm.model,
            temperature: cfg.llm.temperature,
            maxTokens: cfg.llm.maxTokens,
            concurrency: opts.concurrency ?? cfg.llm.concurrency,
            signal: controller.signal,
            onProgress: (done, total, cost) => {
                if (done === total || done % 10 === 0) process.stdout.write(`\rProcessed ${done}/${total} (${formatUsd(cost)})`);
            }
        });
        for (const d of bank.diagnostics) console.warn(`Note: ${d}`);
        const written = await store.writeAll(opts.outputFile);
        console.log(`\nWrote ${written} rows to ${opts.outputFile}${result.runId !== undefined ? ` (ledger run ${result.runId})` : ''}`);
        printSummary(result.summary);
        console.log(`Elapsed: ${formatDurationMs(Date.now() - started)}`);
        if (result.cancelled) {
            console.error(`Run interrupted: ${opts.outputFile} is incomplete and will not pass validation`);
            return 130;
        }
        return 0;
    } finally {
        process.off('SIGINT', onSigint);
        log('done');
    }
}

main().then((code) => {
    process.exitCode = code;
}).catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
