/**
 * APPLICATION CONFIGURATION
 *
 * Central configuration for the submission pipeline. Reads environment
 * variables (optionally from a .env file) and provides typed settings for:
 * - Model provider endpoint, credential and model id
 * - Sampling, timeout and retry parameters for model calls
 * - Worker concurrency and prompt size bound
 * - Few-shot selection seed and call ledger location
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';

export type AppConfig = {
    llm: {
        apiKey?: string;
        baseUrl: string;
        model: string;
        temperature: number;
        maxTokens: number;
        timeoutMs: number;
        maxAttempts: number;
        backoffMs: number;
        concurrency: number;
    };
    prompt: {
        maxChars: number;
        seed: number;
    };
    ledgerPath: string;
};

const num = (def: number) => z.coerce.number().finite().default(def);

const EnvSchema = z.object({
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_BASE: z.string().url().default('https://openrouter.ai/api/v1'),
    OPENROUTER_MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
    LLM_TEMPERATURE: num(0).pipe(z.number().min(0).max(2)),
    LLM_MAX_TOKENS: num(200).pipe(z.number().int().positive()),
    LLM_TIMEOUT_MS: num(60_000).pipe(z.number().int().positive()),
    LLM_MAX_ATTEMPTS: num(4).pipe(z.number().int().min(1).max(10)),
    LLM_BACKOFF_MS: num(500).pipe(z.number().int().nonnegative()),
    LLM_CONCURRENCY: num(4).pipe(z.number().int().min(1).max(32)),
    PROMPT_MAX_CHARS: num(24_000).pipe(z.number().int().positive()),
    FEWSHOT_SEED: num(42).pipe(z.number().int()),
    LEDGER_PATH: z.string().min(1).default('data/ledger/calls.jsonl')
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Empty strings in .env files mean "unset"
    const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`invalid environment: ${issues}`);
    }
    const e = parsed.data;
    return {
        llm: {
            apiKey: e.OPENROUTER_API_KEY,
            baseUrl: e.OPENROUTER_BASE.replace(/\/+$/, ''),
            model: e.OPENROUTER_MODEL,
            temperature: e.LLM_TEMPERATURE,
            maxTokens: e.LLM_MAX_TOKENS,
            timeoutMs: e.LLM_TIMEOUT_MS,
            maxAttempts: e.LLM_MAX_ATTEMPTS,
            backoffMs: e.LLM_BACKOFF_MS,
            concurrency: e.LLM_CONCURRENCY
        },
        prompt: {
            maxChars: e.PROMPT_MAX_CHARS,
            seed: e.FEWSHOT_SEED
        },
        ledgerPath: e.LEDGER_PATH
    };
}

export function requireApiKey(cfg: AppConfig): string {
    if (!cfg.llm.apiKey) throw new ConfigError('OPENROUTER_API_KEY is required');
    return cfg.llm.apiKey;
}
