#!/usr/bin/env node
/**
 * VALIDATE SUBMISSION CLI TOOL
 *
 * Checks a submission file against the test set: columns, uid coverage and
 * uniqueness, ascending order, HTTP methods and request paths. Prints every
 * violation found. Exit code 1 when there is at least one.
 *
 * Usage: tsx src/cli/validateSubmission.ts [--file PATH] [--test-file PATH]
 */

import { Command } from 'commander';
import { formatValidationReport } from '../eval/report.js';
import { validateSubmission } from '../eval/validator.js';
import { parseIntArg } from '../lib/cliArgs.js';
import { loadTestCases } from '../services/datasets.js';

type Options = { file: string; testFile: string; maxViolations: number };

async function main(): Promise<number> {
    const opts = new Command()
        .name('validate-submission')
        .description('Validate a submission file before scoring')
        .option('-f, --file <path>', 'submission to check', 'data/processed/submission.csv')
        .option('--test-file <path>', 'test set defining the expected uids', 'data/processed/test.csv')
        .option('--max-violations <n>', 'violations to print', parseIntArg(1), 50)
        .parse(process.argv)
        .opts<Options>();

    const testCases = await loadTestCases(opts.testFile);
    const report = await validateSubmission(opts.file, testCases.map((t) => t.id));
    for (const line of formatValidationReport(report, opts.maxViolations)) console.log(line);
    return report.ok ? 0 : 1;
}

main().then((code) => {
    process.exitCode = code;
}).catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
});
