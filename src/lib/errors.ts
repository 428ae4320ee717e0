/**
 * ERROR TAXONOMY
 *
 * Run-level errors (data, config, prompt size, non-transient gateway
 * failures) abort a generation run. Row-level errors (transient gateway
 * exhaustion) are absorbed into an UNKNOWN prediction by the pipeline.
 */

export type BenchErrorCode =
    | 'DATA_ERROR'
    | 'CONFIG_ERROR'
    | 'PROMPT_TOO_LARGE'
    | 'TRANSIENT_UNAVAILABLE'
    | 'NON_TRANSIENT_GATEWAY';

export class BenchError extends Error {
    constructor(readonly code: BenchErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class DataError extends BenchError {
    constructor(message: string, readonly file?: string, readonly line?: number) {
        super('DATA_ERROR', file ? `${file}${line ? `:${line}` : ''}: ${message}` : message);
    }
}

export class ConfigError extends BenchError {
    constructor(message: string) {
        super('CONFIG_ERROR', message);
    }
}

export class PromptTooLargeError extends BenchError {
    constructor(readonly length: number, readonly maxChars: number) {
        super('PROMPT_TOO_LARGE', `prompt is ${length} chars, limit is ${maxChars}`);
    }
}

export class TransientUnavailableError extends BenchError {
    constructor(readonly attempts: number, cause: unknown, readonly cost = 0) {
        super('TRANSIENT_UNAVAILABLE', `model unavailable after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
    }
}

export class NonTransientGatewayError extends BenchError {
    constructor(message: string, readonly status?: number) {
        super('NON_TRANSIENT_GATEWAY', message);
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

export function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err) return String(err.code);
    return undefined;
}
