import { CancelledError } from '../errors';

export function toIso(ts: number): string {
    return new Date(ts).toISOString();
}

/**
 * Resolves after `ms`, or rejects with `CancelledError` as soon as
 * `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError('Cancelled before backoff wait'));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError('Cancelled during backoff wait'));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export interface Deadline {
    signal: AbortSignal;
    dispose(): void;
}

/**
 * Child signal that aborts when the parent aborts or after `timeoutMs`.
 * `dispose` clears the timer and detaches from the parent.
 */
export function withDeadline(parent?: AbortSignal, timeoutMs?: number): Deadline {
    const controller = new AbortController();

    const onParentAbort = () => controller.abort(parent?.reason);

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer =
        timeoutMs !== undefined
            ? setTimeout(
                  () => controller.abort(new CancelledError(`Deadline of ${timeoutMs}ms exceeded`)),
                  timeoutMs
              )
            : undefined;

    return {
        signal: controller.signal,
        dispose() {
            if (timer) clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}

function abortError(signal: AbortSignal): CancelledError {
    return signal.reason instanceof CancelledError
        ? signal.reason
        : new CancelledError('Operation cancelled', { cause: signal.reason });
}

/**
 * Settles with `promise`, or rejects with `CancelledError` once `signal`
 * aborts, whichever comes first. The underlying work is not stopped.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) return Promise.reject(abortError(signal));

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortError(signal));
        signal.addEventListener('abort', onAbort, { once: true });

        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}
