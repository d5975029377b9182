import logger from './logger';

export interface RetryOptions {
    retries?: number;
    delay?: number;
    /** Return false to give up immediately on errors that will not go away. */
    shouldRetry?: (error: unknown) => boolean;
    /** Per-error override of `delay`, e.g. a server's Retry-After. */
    delayFor?: (error: unknown) => number | undefined;
}

export async function retryOperation<T>(operation: () => Promise<T>, name: string, options: RetryOptions = {}): Promise<T> {
    const { retries = 5, delay = 2000, shouldRetry = () => true, delayFor } = options;

    for (let i = 0; i < retries; i++) {
        try {
            return await operation();
        } catch (error) {
            if (i === retries - 1 || !shouldRetry(error)) throw error;
            const wait = delayFor?.(error) ?? delay;
            logger.warn(`Failed to ${name}, retrying in ${wait / 1000}s... (${i + 1}/${retries})`);
            await new Promise(resolve => setTimeout(resolve, wait));
        }
    }
    throw new Error(`Failed to ${name} after ${retries} retries`);
}
