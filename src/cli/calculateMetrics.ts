#!/usr/bin/env node
/**
 * CALCULATE METRICS CLI TOOL
 *
 * Scores a submission against a reference file with exact matching:
 *   Accuracy = fully matching requests / all reference requests
 * and prints method/path accuracy, per-method precision/recall/F1 and a
 * sample of errors. Optionally exports every error as a table.
 *
 * Usage: tsx src/cli/calculateMetrics.ts [--pred PATH] [--true PATH]
 *        [--show-errors N] [--save-errors PATH]
 */

import { Command } from 'commander';
import { ERRORS_HEADER, errorRows, score } from '../eval/metrics.js';
import { formatMetricsReport } from '../eval/report.js';
import { parseIntArg } from '../lib/cliArgs.js';
import { formatCsv, writeFileAtomic } from '../lib/csv.js';
import { SubmissionStore } from '../persistence/submissionStore.js';
import { loadReferences } from '../services/datasets.js';

type Options = { pred: string; true: string; showErrors: number; saveErrors?: string };

async function main(): Promise<number> {
    const opts = new Command()
        .name('calculate-metrics')
        .description('Compute exact-match accuracy of a submission')
        .option('--pred <path>', 'predicted submission', 'data/processed/submission.csv')
        .option('--true <path>', 'reference answers (uid;type;request)', 'data/processed/train.csv')
        .option('--show-errors <n>', 'errors to print', parseIntArg(0), 0)
        .option('--save-errors <path>', 'write every error to this file')
        .parse(process.argv)
        .opts<Options>();

    console.log(`Predicted:    ${opts.pred}`);
    console.log(`Ground truth: ${opts.true}`);
    const predictions = await SubmissionStore.readAll(opts.pred);
    const references = await loadReferences(opts.true);
    const report = score(predictions, references, { maxErrors: opts.showErrors });
    console.log('');
    for (const line of formatMetricsReport(report)) console.log(line);

    if (opts.saveErrors && report.errors.length > 0) {
        await writeFileAtomic(opts.saveErrors, formatCsv(ERRORS_HEADER, errorRows(report.errors)));
        console.log(`\nErrors saved to ${opts.saveErrors}`);
    }
    return 0;
}

main().then((code) => {
    process.exitCode = code;
}).catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
