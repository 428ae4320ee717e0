/**
 * METRICS
 *
 * Exact-match scoring: a prediction counts only when both method and path
 * are byte-identical to the reference for the same uid. UNKNOWN and
 * missing predictions are always wrong. References are read, never changed.
 */

import type { HttpMethod, PredictedMethod, ReferenceRow, SubmissionRow } from '../types/dataset.js';
import { UNKNOWN_METHOD } from '../types/dataset.js';

export type MethodBreakdown = { total: number; correct: number };

/**
 * Per-method classification counts. A hit (tp) needs the full request to
 * match; fp/fn are only charged when the method itself is wrong or missing.
 */
export type MethodStats = {
    tp: number;
    fp: number;
    fn: number;
    precision: number;
    recall: number;
    f1: number;
};

export type ScoredError = {
    id: number;
    kind: 'missing' | 'mismatch';
    expected: { method: HttpMethod; path: string };
    predicted?: { method: PredictedMethod; path: string };
    methodMatch: boolean;
    pathMatch: boolean;
};

export type MetricsReport = {
    accuracy: number;
    correctCount: number;
    totalCount: number;
    methodAccuracy: number;
    pathAccuracy: number;
    missingCount: number;
    unknownCount: number;
    perMethod: Record<string, MethodBreakdown>;
    methodStats: Record<string, MethodStats>;
    /** Every mismatch, ascending uid. */
    errors: ScoredError[];
    /** First `maxErrors` entries of `errors`. */
    sampleErrors: ScoredError[];
};

export type ScoreOptions = { maxErrors?: number };

const ratio = (a: number, b: number): number => (b > 0 ? a / b : 0);

export function score(predictions: readonly SubmissionRow[], references: readonly ReferenceRow[], opts: ScoreOptions = {}): MetricsReport {
    const predicted = new Map<number, SubmissionRow>();
    for (const p of predictions) predicted.set(p.id, p);
    const refs = references.slice().sort((a, b) => a.id - b.id);

    let correct = 0;
    let methodOk = 0;
    let pathOk = 0;
    let missing = 0;
    let unknown = 0;
    const perMethod: Record<string, MethodBreakdown> = {};
    const counts = new Map<string, { tp: number; fp: number; fn: number }>();
    const statsFor = (method: string) => {
        const c = counts.get(method) ?? { tp: 0, fp: 0, fn: 0 };
        counts.set(method, c);
        return c;
    };
    const bump = (method: string, key: 'tp' | 'fp' | 'fn') => {
        statsFor(method)[key]++;
    };
    const errors: ScoredError[] = [];

    for (const ref of refs) {
        const bucket = perMethod[ref.method] ?? (perMethod[ref.method] = { total: 0, correct: 0 });
        bucket.total++;
        statsFor(ref.method);
        const expected = { method: ref.method, path: ref.path };
        const pred = predicted.get(ref.id);
        if (!pred) {
            missing++;
            bump(ref.method, 'fn');
            errors.push({ id: ref.id, kind: 'missing', expected, methodMatch: false, pathMatch: false });
            continue;
        }
        if (pred.method === UNKNOWN_METHOD) unknown++;
        const methodMatch = pred.method === ref.method;
        const pathMatch = pred.method !== UNKNOWN_METHOD && pred.path === ref.path;
        if (methodMatch) {
            methodOk++;
        } else {
            bump(ref.method, 'fn');
            if (pred.method !== UNKNOWN_METHOD) bump(pred.method, 'fp');
        }
        if (pathMatch) pathOk++;
        if (methodMatch && pathMatch) {
            correct++;
            bucket.correct++;
            bump(ref.method, 'tp');
        } else {
            errors.push({ id: ref.id, kind: 'mismatch', expected, predicted: { method: pred.method, path: pred.path }, methodMatch, pathMatch });
        }
    }

    const methodStats: Record<string, MethodStats> = {};
    for (const [method, c] of Array.from(counts.entries()).sort(([a], [b]) => a.localeCompare(b))) {
        const precision = ratio(c.tp, c.tp + c.fp);
        const recall = ratio(c.tp, c.tp + c.fn);
        methodStats[method] = { ...c, precision, recall, f1: ratio(2 * precision * recall, precision + recall) };
    }

    const total = refs.length;
    return {
        accuracy: ratio(correct, total),
        correctCount: correct,
        totalCount: total,
        methodAccuracy: ratio(methodOk, total),
        pathAccuracy: ratio(pathOk, total),
        missingCount: missing,
        unknownCount: unknown,
        perMethod,
        methodStats,
        errors,
        sampleErrors: errors.slice(0, Math.max(0, opts.maxErrors ?? 5))
    };
}

export const ERRORS_HEADER = ['uid', 'error_type', 'true_type', 'pred_type', 'true_request', 'pred_request', 'type_match', 'request_match'] as const;

export function errorRows(errors: readonly ScoredError[]): string[][] {
    return errors.map((e) => [
        String(e.id),
        e.kind,
        e.expected.method,
        e.predicted?.method ?? '',
        e.expected.path,
        e.predicted?.path ?? '',
        e.kind === 'missing' ? '' : (e.methodMatch ? 'yes' : 'no'),
        e.kind === 'missing' ? '' : (e.pathMatch ? 'yes' : 'no')
    ]);
}
