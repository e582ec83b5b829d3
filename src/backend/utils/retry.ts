/**
 * Bounded retry with exponential backoff.
 *
 * Every network call in the system goes through this helper, so there is no
 * unbounded retry anywhere: `retries` is the number of attempts after the first.
 */

export interface RetryOptions {
    retries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function retryWithBackoff<T>(
    task: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let attempt = 0;

    while (true) {
        try {
            return await task(attempt);
        } catch (error) {
            const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
            if (!retryable || attempt >= options.retries) {
                throw error;
            }

            const delay = Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
            options.onRetry?.(error, attempt + 1, delay);
            await sleep(delay);
            attempt += 1;
        }
    }
}
