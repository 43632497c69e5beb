import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Results keep the input order.
 *
 * Each task starts on a fresh event-loop turn. Once `signal` aborts, no
 * further task starts and the returned promise rejects with the abort reason;
 * tasks already running finish first.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => R | Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    signal?.throwIfAborted();

    const results = new Array<R>(items.length);
    const queue = items.map((item, index) => ({ item, index }));

    const worker = async (): Promise<void> => {
        for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
            await yieldToEventLoop();
            signal?.throwIfAborted();
            results[next.index] = await task(next.item, next.index);
        }
    };

    const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
    await Promise.all(workers);

    return results;
}
