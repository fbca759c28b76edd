/**
 * Resilience Utility
 *
 * Bounds IO-bound operations (remote model calls) in time and lets callers abandon them.
 */

export class TimeoutError extends Error {
    constructor(name: string, timeoutMs: number) {
        super(`${name} timed out after ${timeoutMs}ms`);
        this.name = "TimeoutError";
    }
}

export class AbortedError extends Error {
    constructor(name: string) {
        super(`${name} was aborted by the caller`);
        this.name = "AbortedError";
    }
}

/**
 * Races an async operation against a timer and an optional abort signal.
 * The operation receives a signal that fires on either, so it can stop its own IO.
 * The guard rejects before that signal fires, so the timeout or abort is what the caller sees.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    options: { timeoutMs: number; name?: string; signal?: AbortSignal },
): Promise<T> {
    const name = options.name || "Operation";
    const controller = new AbortController();

    if (options.signal?.aborted) {
        throw new AbortedError(name);
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(name, options.timeoutMs));
            controller.abort();
        }, options.timeoutMs);

        onAbort = () => {
            reject(new AbortedError(name));
            controller.abort();
        };
        options.signal?.addEventListener("abort", onAbort, { once: true });
    });

    try {
        return await Promise.race([operation(controller.signal), guard]);
    } finally {
        clearTimeout(timer);
        if (onAbort) options.signal?.removeEventListener("abort", onAbort);
    }
}
