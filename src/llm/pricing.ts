import type { TokenUsage } from './provider.js';

/** USD per one million tokens. */
export type ModelPrice = { prompt: number; completion: number };

export const DEFAULT_PRICES: Readonly<Record<string, ModelPrice>> = {
    'openai/gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
    'openai/gpt-4o': { prompt: 2.5, completion: 10 },
    'openai/gpt-3.5-turbo': { prompt: 0.5, completion: 1.5 },
    'anthropic/claude-3-sonnet': { prompt: 3, completion: 15 },
    'anthropic/claude-3-haiku': { prompt: 0.25, completion: 1.25 }
};

// Unlisted models are billed like gpt-4o-mini
const FALLBACK_PRICE: ModelPrice = { prompt: 0.15, completion: 0.6 };

export function priceFor(model: string, table: Readonly<Record<string, ModelPrice>> = DEFAULT_PRICES): ModelPrice {
    return table[model] ?? FALLBACK_PRICE;
}

export function costOf(usage: TokenUsage | undefined, model: string, table?: Readonly<Record<string, ModelPrice>>): number {
    if (!usage) return 0;
    const price = priceFor(model, table);
    return (usage.promptTokens / 1_000_000) * price.prompt + (usage.completionTokens / 1_000_000) * price.completion;
}
