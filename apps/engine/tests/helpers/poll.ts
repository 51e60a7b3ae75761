export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export async function waitUntil(
    predicate: () => Promise<boolean> | boolean,
    timeoutMs = 5000,
    intervalMs = 10
): Promise<void> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
        if (await predicate()) return;
        await sleep(intervalMs);
    }
    throw new Error(`waitUntil timed out after ${timeoutMs}ms`);
}

/** A promise plus the functions that settle it, for holding a task body open. */
export function deferred<T = void>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
