import { toError } from './bootstrap-error';
import type { LoggingProxyAdapter } from './logging-proxy';

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
        setTimeout(resolve, ms);
    });
}

/**
 * Component of retry(). An emitter function that returns a promise of type TResult.
 * @template TResult a generic type for the returning value.
 * @returns {Promise<TResult>} the returning result in a promise
 */
export type RetryPromiseEmitter<TResult> = () => Promise<TResult>;

/**
 * Component of retry(). Decides whether the error thrown by the emitter allows another attempt.
 * @param {Error} error the error thrown by the last attempt
 * @param {number} callCount the number of time the emitter function been called.
 * @returns {boolean} true to try again
 */
export type RetryErrorChecker = (error: Error, callCount: number) => boolean;

/**
 * Run an emitter until it resolves, at most 1 + retryCount times, waiting interval ms between
 * attempts. Errors the checker doesn't accept are thrown at once.
 *
 * @template TResult a generic type for the values returned by the emitter.
 * @param {RetryPromiseEmitter<TResult>} promiseEmitter the emitter that return a value of TResult
 * @param {RetryErrorChecker} errorChecker whether an error can be retried
 * @param {number} retryCount additional attempts allowed
 * @param {number} interval milliseconds interval between each calling emitter.
 * @param {LoggingProxyAdapter} [proxy] a proxy (if provided) that prints logs within the
 * retry process.
 * @returns {Promise<TResult>} the returning result of the emitter
 */
export async function retry<TResult>(
    promiseEmitter: RetryPromiseEmitter<TResult>,
    errorChecker: RetryErrorChecker,
    retryCount: number,
    interval: number,
    proxy?: LoggingProxyAdapter
): Promise<TResult> {
    let count = 0;
    for (;;) {
        try {
            return await promiseEmitter();
        } catch (error) {
            count++;
            const err = toError(error);
            if (count > retryCount || !errorChecker(err, count)) {
                throw err;
            }
            if (proxy) {
                proxy.logAsWarning(
                    `Attempt ${count} of ${retryCount + 1} failed: ${err.message}` +
                        ` Retry in ${interval} ms.`
                );
            }
            await sleep(interval);
        }
    }
}

/**
 * A value produced by an async resolver the first time it is requested, then shared. The
 * resolver runs once: a failure is shared the same way as a value.
 */
export class Once<T> {
    private pending: Promise<T> | null = null;
    constructor(private readonly resolver: () => Promise<T>) {}

    get(): Promise<T> {
        if (!this.pending) {
            this.pending = this.resolver();
        }
        return this.pending;
    }
}

export function isRecord(value: unknown): value is { [key: string]: unknown } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
