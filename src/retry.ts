import { sleep } from './utils.js';

export interface RetryOptions {
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN']);
const MAX_RETRY_DELAY_MS = 60_000;

const readProperty = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

/**
 * Network resets, timeouts, throttling and server errors are worth another attempt.
 */
export const isRetryableError = (error: unknown): boolean => {
  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const status = readProperty(readProperty(error, 'response'), 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') {
    return status === 403 || status === 429 || (status >= 500 && status < 600);
  }

  const message = error instanceof Error ? error.message : String(error);
  return /Status code: (403|429|5\d\d)/i.test(message);
};

/**
 * Exponential backoff capped at one minute.
 */
export const calculateRetryDelay = (retryDelayMs: number, attempt: number): number =>
  Math.min(retryDelayMs * 2 ** attempt, MAX_RETRY_DELAY_MS);

export const withRetry = async <T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> => {
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryableError(error)) {
        throw error;
      }
      const delayMs = calculateRetryDelay(options.retryDelayMs, attempt);
      options.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
};
