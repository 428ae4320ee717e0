/**
 * LLM PROVIDER INTERFACE & IMPLEMENTATIONS
 *
 * Abstraction layer for language model completions:
 * - Plain chat completions against OpenAI-compatible endpoints (OpenRouter by default)
 * - Per-request timeout and external cancellation
 * - Typed errors carrying HTTP status, Retry-After and billed usage
 *
 * Retry decisions live in the retry policy, not here: a provider makes
 * exactly one HTTP call per complete().
 */

import { z } from 'zod';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type TokenUsage = { promptTokens: number; completionTokens: number };

export type CompletionRequest = {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    maxTokens?: number;
    signal?: AbortSignal;
};

export type RawCompletion = {
    text: string;
    model: string;
    usage?: TokenUsage;
    finishReason?: string;
};

export interface LLMProvider {
    complete(req: CompletionRequest): Promise<RawCompletion>;
}

export class ProviderHttpError extends Error {
    constructor(readonly status: number, readonly body: string, readonly retryAfterMs?: number, readonly usage?: TokenUsage) {
        super(`LLM API ${status}: ${body.slice(0, 300)}`);
        this.name = 'ProviderHttpError';
    }
}

export class ProviderTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`LLM request timed out after ${timeoutMs}ms`);
        this.name = 'ProviderTimeoutError';
    }
}

export class ProviderNetworkError extends Error {
    constructor(cause: unknown) {
        super(`LLM request failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'ProviderNetworkError';
    }
}

export class ProviderResponseError extends Error {
    constructor(message: string, readonly usage?: TokenUsage) {
        super(message);
        this.name = 'ProviderResponseError';
    }
}

const UsageSchema = z.object({
    prompt_tokens: z.number().nonnegative().default(0),
    completion_tokens: z.number().nonnegative().default(0)
});

const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional()
    })),
    usage: UsageSchema.optional()
});

const ErrorBodySchema = z.object({ usage: UsageSchema.optional() }).passthrough();

function toUsage(u: z.infer<typeof UsageSchema> | undefined): TokenUsage | undefined {
    return u ? { promptTokens: u.prompt_tokens, completionTokens: u.completion_tokens } : undefined;
}

function parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;
    const secs = Number(value);
    if (Number.isFinite(secs) && secs >= 0) return secs * 1000;
    const at = Date.parse(value);
    return Number.isFinite(at) ? Math.max(0, at - Date.now()) : undefined;
}

function usageFromErrorBody(text: string): TokenUsage | undefined {
    try {
        const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
        return parsed.success ? toUsage(parsed.data.usage) : undefined;
    } catch {
        return undefined;
    }
}

export type OpenRouterOptions = {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    fetchImpl?: typeof fetch;
};

export class OpenRouterProvider implements LLMProvider {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly opts: OpenRouterOptions) {
        if (!opts.apiKey) throw new Error('OPENROUTER_API_KEY is required');
        this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    }

    async complete(req: CompletionRequest): Promise<RawCompletion> {
        const body: Record<string, unknown> = {
            model: req.model,
            messages: req.messages,
            temperature: req.temperature
        };
        if (req.maxTokens) body.max_tokens = req.maxTokens;

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.opts.timeoutMs);
        const onAbort = () => controller.abort(req.signal?.reason);
        req.signal?.addEventListener('abort', onAbort, { once: true });

        let res: Response;
        try {
            if (req.signal?.aborted) throw req.signal.reason;
            res = await this.fetchImpl(`${this.opts.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${this.opts.apiKey}`,
                    'Content-Type': 'application/json'
                },
                body: JSON.stringify(body),
                signal: controller.signal
            });
        } catch (e) {
            if (timedOut) throw new ProviderTimeoutError(this.opts.timeoutMs);
            if (req.signal?.aborted) throw e;
            throw new ProviderNetworkError(e);
        } finally {
            clearTimeout(timer);
            req.signal?.removeEventListener('abort', onAbort);
        }

        if (!res.ok) {
            const errText = await res.text().catch(() => '');
            throw new ProviderHttpError(res.status, errText, parseRetryAfter(res.headers.get('retry-after')), usageFromErrorBody(errText));
        }
        let json: unknown;
        try {
            json = await res.json();
        } catch (e) {
            throw new ProviderResponseError(`LLM API returned invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
        }
        const parsed = ChatCompletionSchema.safeParse(json);
        if (!parsed.success) throw new ProviderResponseError('LLM API response has an unexpected shape');
        const usage = toUsage(parsed.data.usage);
        const choice = parsed.data.choices[0];
        if (!choice) throw new ProviderResponseError('LLM API returned no choices', usage);
        return {
            text: choice.message?.content ?? '',
            model: parsed.data.model ?? req.model,
            usage,
            finishReason: choice.finish_reason ?? undefined
        };
    }
}
