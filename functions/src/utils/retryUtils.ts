import axios from 'axios';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  shouldRetry: () => true,
};

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Network failures, 429s and 5xx responses are worth another attempt;
 * anything else (bad request, auth) will fail the same way again.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  if (status === undefined) {
    return true;
  }

  return status === 429 || status >= 500;
}

/**
 * Executes a function with exponential backoff retry logic
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  let currentDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxAttempts || !config.shouldRetry(error)) {
        throw error;
      }

      config.onRetry?.(error, attempt, currentDelay);
      await delay(currentDelay);
      currentDelay = Math.min(currentDelay * config.backoffFactor, config.maxDelayMs);
    }
  }
}
