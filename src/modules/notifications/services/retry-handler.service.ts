import { sleep } from '../../../common/utils/sleep.util.js';

export type RetryDelay = number | ((attempt: number, error: unknown) => number);

export class RetryHandlerService {
  async sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
    return sleep(ms, abortSignal);
  }

  /**
   * Run `operation` until it succeeds, `shouldRetry` refuses the error
   * or `maxAttempts` is reached. The last error is rethrown.
   */
  async executeWithRetry<T>(params: {
    operation: (attempt: number) => Promise<T>;
    maxAttempts: number;
    retryDelay: RetryDelay;
    shouldRetry: (error: unknown) => boolean;
    abortSignal?: AbortSignal;
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  }): Promise<T> {
    const { operation, maxAttempts, retryDelay, shouldRetry, abortSignal, onRetry } = params;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt === maxAttempts || !shouldRetry(error)) {
          throw error;
        }

        const delay = typeof retryDelay === 'number' ? retryDelay : retryDelay(attempt, error);
        onRetry?.(attempt, error, delay);

        await this.sleep(delay, abortSignal);
      }
    }

    throw new Error('Retry logic failed unexpectedly');
  }
}
