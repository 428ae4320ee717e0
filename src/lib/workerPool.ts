/**
 * Bounded worker pool over an ordered queue. Results land at the index of
 * their input, whatever order the workers finish in. The first worker
 * error stops the pool and is rethrown; an external abort stops taking new
 * items and reports the run as cancelled.
 */

export type PoolOptions = {
    concurrency: number;
    signal?: AbortSignal;
};

export type PoolOutcome<R> = {
    results: Array<R | undefined>;
    completed: number;
    cancelled: boolean;
};

export async function runPool<T, R>(
    items: readonly T[],
    worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
    opts: PoolOptions
): Promise<PoolOutcome<R>> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(opts.signal?.reason);
    if (opts.signal?.aborted) controller.abort(opts.signal.reason);
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    const results: Array<R | undefined> = new Array(items.length).fill(undefined);
    let next = 0;
    let completed = 0;
    let failed = false;
    let firstError: unknown;

    async function lane(): Promise<void> {
        while (!controller.signal.aborted && next < items.length) {
            const idx = next++;
            const item = items[idx];
            if (item === undefined) continue;
            try {
                results[idx] = await worker(item, idx, controller.signal);
                completed++;
            } catch (e) {
                // Errors raised by the abort itself are not failures
                if (!controller.signal.aborted && !failed) {
                    failed = true;
                    firstError = e;
                    controller.abort(e);
                }
                return;
            }
        }
    }

    const lanes = Math.max(1, Math.min(Math.floor(opts.concurrency), items.length));
    try {
        await Promise.all(Array.from({ length: lanes }, () => lane()));
    } finally {
        opts.signal?.removeEventListener('abort', onAbort);
    }
    if (failed) throw firstError;
    return { results, completed, cancelled: opts.signal?.aborted ?? false };
}
