#!/usr/bin/env node
/**
 * EVALUATE CLI TOOL
 *
 * Leaderboard scoring with a public/private split. The submission must
 * first pass validation against the uids of both reference files; only
 * then are the two accuracies computed. Prints the scores as JSON.
 *
 * Usage: tsx src/cli/evaluate.ts --pred PATH --public PATH --private PATH [--show-errors N]
 *
 * Exit codes: 0 scored, 1 validation failed (both scores 0) or bad input.
 */

import { Command } from 'commander';
import { evaluateLeaderboard } from '../eval/leaderboard.js';
import type { MetricsReport } from '../eval/metrics.js';
import { formatValidationReport } from '../eval/report.js';
import { parseIntArg } from '../lib/cliArgs.js';
import { loadReferences } from '../services/datasets.js';

type Options = { pred: string; public: string; private: string; showErrors: number };

function splitSummary(m: MetricsReport) {
    return {
        accuracy: m.accuracy,
        correct: m.correctCount,
        total: m.totalCount,
        methodAccuracy: m.methodAccuracy,
        pathAccuracy: m.pathAccuracy,
        perMethod: m.perMethod,
        sampleErrors: m.sampleErrors
    };
}

async function main(): Promise<number> {
    const opts = new Command()
        .name('evaluate-submission')
        .description('Validate a submission, then score it on the public and private reference splits')
        .requiredOption('--pred <path>', 'predicted submission')
        .requiredOption('--public <path>', 'public reference answers (uid;type;request)')
        .requiredOption('--private <path>', 'private reference answers (uid;type;request)')
        .option('--show-errors <n>', 'mismatches to include per split', parseIntArg(0), 0)
        .parse(process.argv)
        .opts<Options>();

    const publicRefs = await loadReferences(opts.public);
    const privateRefs = await loadReferences(opts.private);
    const result = await evaluateLeaderboard(opts.pred, publicRefs, privateRefs, { maxErrors: opts.showErrors });
    if (!result.public || !result.private) {
        for (const line of formatValidationReport(result.validation)) console.error(line);
        console.log(JSON.stringify({ publicScore: 0, privateScore: 0, validationFailed: true }, null, 2));
        return 1;
    }
    console.log(JSON.stringify({
        publicScore: result.publicScore,
        privateScore: result.privateScore,
        public: splitSummary(result.public),
        private: splitSummary(result.private)
    }, null, 2));
    return 0;
}

main().then((code) => {
    process.exitCode = code;
}).catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
