/**
 * Console renderings of validation and metrics reports. Returned as lines
 * so the CLIs print them and tests can assert them.
 */

import { formatPct } from '../lib/format.js';
import type { MetricsReport } from './metrics.js';
import type { ValidationReport } from './validator.js';

export function formatValidationReport(report: ValidationReport, maxViolations = 50): string[] {
    if (report.ok) return [`OK: ${report.file} (${report.rowCount} rows)`];
    const lines = [`FAILED: ${report.file} has ${report.violations.length} violation(s)`];
    for (const v of report.violations.slice(0, maxViolations)) {
        const where = v.line !== undefined ? `line ${v.line}: ` : '';
        lines.push(`  [${v.code}] ${where}${v.message}`);
    }
    if (report.violations.length > maxViolations) lines.push(`  ... and ${report.violations.length - maxViolations} more`);
    return lines;
}

export function verdict(accuracy: number): string {
    if (accuracy === 1) return 'Perfect: every request matches the reference';
    if (accuracy >= 0.9) return 'Excellent accuracy';
    if (accuracy >= 0.7) return 'Good accuracy, room to improve';
    if (accuracy >= 0.5) return 'Average: revisit the prompt and few-shot examples';
    return 'Poor: needs substantial work';
}

export function formatMetricsReport(report: MetricsReport): string[] {
    const lines = [
        `Accuracy = ${report.correctCount}/${report.totalCount} = ${report.accuracy.toFixed(4)} (${formatPct(report.accuracy)})`,
        '',
        `Method accuracy:  ${formatPct(report.methodAccuracy)}`,
        `Path accuracy:    ${formatPct(report.pathAccuracy)}`,
        `Missing rows:     ${report.missingCount}`,
        `UNKNOWN rows:     ${report.unknownCount}`,
        '',
        'By reference method:'
    ];
    for (const [method, b] of Object.entries(report.perMethod).sort(([a], [c]) => a.localeCompare(c))) {
        lines.push(`  ${method.padEnd(8)} ${b.correct}/${b.total}`);
    }
    lines.push('', `  ${'Method'.padEnd(8)} ${'Precision'.padEnd(10)} ${'Recall'.padEnd(10)} F1`);
    for (const [method, s] of Object.entries(report.methodStats)) {
        lines.push(`  ${method.padEnd(8)} ${s.precision.toFixed(4).padEnd(10)} ${s.recall.toFixed(4).padEnd(10)} ${s.f1.toFixed(4)}`);
    }
    if (report.sampleErrors.length > 0) {
        lines.push('', `First ${report.sampleErrors.length} error(s):`);
        for (const e of report.sampleErrors) {
            if (e.kind === 'missing') {
                lines.push(`  uid ${e.id}: missing, expected ${e.expected.method} ${e.expected.path}`);
            } else {
                lines.push(`  uid ${e.id}: got ${e.predicted?.method ?? ''} ${e.predicted?.path ?? ''}, expected ${e.expected.method} ${e.expected.path}`);
            }
        }
    }
    lines.push('', verdict(report.accuracy));
    return lines;
}
