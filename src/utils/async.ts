/**
 * Shared async utilities for CLI tools.
 */

// ============= Timeout =============

/**
 * Race a promise against a timeout. Rejects with `timeoutError` (or a default error)
 * if the promise doesn't resolve within `timeoutMs`.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutError?: Error,
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(timeoutError || new Error(`Operation timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });
    return Promise.race([promise, timeoutPromise]).finally(() => {
        clearTimeout(timer);
    });
}

// ============= Mutex =============

/**
 * Serialises async critical sections: each `runExclusive` call starts only
 * after every earlier one has settled. A rejected section does not block the queue.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const run = this.tail.then(fn);
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}
