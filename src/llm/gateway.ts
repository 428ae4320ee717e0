/**
 * MODEL GATEWAY
 *
 * Sends one prompt to the provider under a retry policy and bills every
 * attempt into the caller's CostMeter. Failure mapping:
 * - retries exhausted on transient errors → TransientUnavailableError (row-level)
 * - auth/request errors from the provider  → NonTransientGatewayError (run-level)
 */

import createDebug from 'debug';
import { NonTransientGatewayError, TransientUnavailableError } from '../lib/errors.js';
import type { CostMeter } from './costMeter.js';
import { costOf, type ModelPrice } from './pricing.js';
import { ProviderHttpError, ProviderResponseError, type LLMProvider, type TokenUsage } from './provider.js';
import { withRetry, type RetryPolicy, type Sleep } from './retryPolicy.js';

const log = createDebug('bench:gateway');

export type AttemptRecord = {
    attempt: number;
    ok: boolean;
    model: string;
    durationMs: number;
    cost: number;
    usage?: TokenUsage;
    text?: string;
    error?: string;
    status?: number;
};

export type GatewayContext = {
    model: string;
    temperature: number;
    maxTokens?: number;
    meter: CostMeter;
    signal?: AbortSignal;
    /** Called after every attempt, successful or not. */
    onAttempt?: (record: AttemptRecord) => void;
};

export type GatewayCompletion = {
    text: string;
    attempts: number;
    /** Sum over all attempts of this call, failed ones included. */
    cost: number;
    usage?: TokenUsage;
};

function usageOf(err: unknown): TokenUsage | undefined {
    if (err instanceof ProviderHttpError || err instanceof ProviderResponseError) return err.usage;
    return undefined;
}

export class ModelGateway {
    constructor(
        private readonly provider: LLMProvider,
        private readonly policy: RetryPolicy,
        private readonly prices?: Readonly<Record<string, ModelPrice>>,
        private readonly sleep?: Sleep
    ) { }

    async complete(prompt: string, ctx: GatewayContext): Promise<GatewayCompletion> {
        let callCost = 0;
        let attempts = 0;
        const bill = (attempt: number, started: number, usage: TokenUsage | undefined, extra: Partial<AttemptRecord>): void => {
            const cost = costOf(usage, ctx.model, this.prices);
            callCost += cost;
            ctx.meter.add(cost, usage);
            ctx.onAttempt?.({ attempt, ok: false, model: ctx.model, durationMs: Date.now() - started, cost, usage, ...extra });
        };

        try {
            const res = await withRetry(async (attempt) => {
                attempts = attempt;
                const started = Date.now();
                try {
                    const out = await this.provider.complete({
                        model: ctx.model,
                        messages: [{ role: 'user', content: prompt }],
                        temperature: ctx.temperature,
                        maxTokens: ctx.maxTokens,
                        signal: ctx.signal
                    });
                    bill(attempt, started, out.usage, { ok: true, text: out.text });
                    return out;
                } catch (e) {
                    bill(attempt, started, usageOf(e), {
                        error: e instanceof Error ? e.message : String(e),
                        status: e instanceof ProviderHttpError ? e.status : undefined
                    });
                    throw e;
                }
            }, this.policy, {
                sleep: this.sleep,
                signal: ctx.signal,
                onRetry: (attempt, err, delayMs) => log('attempt %d failed (%s); retrying in %dms', attempt, err instanceof Error ? err.message : String(err), delayMs)
            });
            return { text: res.text, attempts, cost: callCost, usage: res.usage };
        } catch (e) {
            if (e instanceof TransientUnavailableError) throw new TransientUnavailableError(e.attempts, e.cause, callCost);
            if (e instanceof ProviderHttpError) throw new NonTransientGatewayError(e.message, e.status);
            throw e;
        }
    }
}
