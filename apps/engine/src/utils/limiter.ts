// Bounded worker pool for task bodies. Shared by every run of a controller, so
// the bound holds across concurrent passes, not per stage.
export interface Limiter {
    run<T>(fn: () => Promise<T>): Promise<T>;
    readonly active: number;
    readonly queueSize: number;
}

export function createLimiter(maxConcurrent: number): Limiter {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
        throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    let active = 0;
    const waiting: (() => void)[] = [];

    // A released slot passes straight to the next waiter, so `active` never
    // dips below the bound while callers are queued.
    const release = () => {
        const next = waiting.shift();
        if (next) next();
        else active--;
    };

    return {
        async run<T>(fn: () => Promise<T>): Promise<T> {
            if (active >= maxConcurrent) {
                await new Promise<void>(resolve => waiting.push(resolve));
            } else {
                active++;
            }
            try {
                return await fn();
            } finally {
                release();
            }
        },
        get active() {
            return active;
        },
        get queueSize() {
            return waiting.length;
        },
    };
}
