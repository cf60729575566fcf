/**
 * @file    concurrency.ts
 * @purpose Bounded fan-out and per-task deadlines for the per-document stages.
 */

import { ClaimCancelledError, ExtractionTimeoutError } from "../errors";

/**
 * Run async tasks with a concurrency limit. Results keep task order.
 * Tasks are expected to settle on their own; a rejection rejects the whole run.
 */
export async function runWithConcurrency<T>(
    tasks: (() => Promise<T>)[],
    concurrency: number = 4,
    onProgress?: (completed: number, total: number) => void
): Promise<T[]> {
    const results: T[] = new Array(tasks.length);
    let nextIdx = 0;
    let completed = 0;

    async function runNext(): Promise<void> {
        while (nextIdx < tasks.length) {
            const idx = nextIdx++;
            results[idx] = await tasks[idx]();
            completed++;
            onProgress?.(completed, tasks.length);
        }
    }

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, tasks.length)) }, () => runNext());
    await Promise.all(workers);
    return results;
}

/**
 * Race `work` against a deadline and an optional abort signal. The losing
 * promise is abandoned, never awaited, so its late result is simply dropped.
 */
export function withDeadline<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    outer?: AbortSignal
): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        let settled = false;
        const finish = (fn: () => void) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            outer?.removeEventListener("abort", onAbort);
            fn();
        };

        const timer = setTimeout(() => {
            controller.abort();
            finish(() => reject(new ExtractionTimeoutError(timeoutMs)));
        }, timeoutMs);

        const onAbort = () => {
            controller.abort();
            finish(() => reject(new ClaimCancelledError()));
        };

        if (outer?.aborted) {
            onAbort();
            return;
        }
        outer?.addEventListener("abort", onAbort, { once: true });

        let pending: Promise<T>;
        try {
            pending = work(controller.signal);
        } catch (err) {
            finish(() => reject(err));
            return;
        }
        pending.then(
            value => finish(() => resolve(value)),
            err => finish(() => reject(err))
        );
    });
}
