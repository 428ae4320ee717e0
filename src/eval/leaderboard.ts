/**
 * LEADERBOARD
 *
 * Public/private split scoring. A submission must cover the union of both
 * reference sets and pass validation; otherwise both scores are 0. Scores
 * are accuracy percentages rounded to two decimals.
 */

import { SubmissionStore } from '../persistence/submissionStore.js';
import type { ReferenceRow } from '../types/dataset.js';
import { score, type MetricsReport, type ScoreOptions } from './metrics.js';
import { validateSubmission, type ValidationReport } from './validator.js';

export type LeaderboardResult = {
    validation: ValidationReport;
    publicScore: number;
    privateScore: number;
    /** Present only when validation passed. */
    public?: MetricsReport;
    private?: MetricsReport;
};

export function toScore(accuracy: number): number {
    return Math.round(accuracy * 10_000) / 100;
}

export async function evaluateLeaderboard(
    submissionPath: string,
    publicRefs: readonly ReferenceRow[],
    privateRefs: readonly ReferenceRow[],
    opts: ScoreOptions = {}
): Promise<LeaderboardResult> {
    const required = new Set([...publicRefs, ...privateRefs].map((r) => r.id));
    const validation = await validateSubmission(submissionPath, required);
    if (!validation.ok) return { validation, publicScore: 0, privateScore: 0 };

    const predictions = await SubmissionStore.readAll(submissionPath);
    const pub = score(predictions, publicRefs, opts);
    const priv = score(predictions, privateRefs, opts);
    return {
        validation,
        publicScore: toScore(pub.accuracy),
        privateScore: toScore(priv.accuracy),
        public: pub,
        private: priv
    };
}
