import { APICallError } from 'ai';

export interface RetryOptions {
  /** Retries after the first attempt */
  retries: number;
  /** Delay unit for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound of the random jitter added to each delay (default: 500) */
  maxJitterMs?: number;
  /** Once aborted no further attempt is started */
  signal?: AbortSignal;
  /** Decides whether a failure is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  /** Called before sleeping ahead of retry number `attempt` (1-based) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
export const DEFAULT_RETRY_MAX_JITTER_MS = 500;

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/**
 * `baseDelayMs * 2^attempt` plus jitter in `[0, maxJitterMs)`
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number = DEFAULT_RETRY_BASE_DELAY_MS,
  maxJitterMs: number = DEFAULT_RETRY_MAX_JITTER_MS,
  random: () => number = Math.random,
): number {
  return baseDelayMs * 2 ** attempt + Math.floor(random() * maxJitterMs);
}

function stringField(
  error: unknown,
  field: 'code' | 'name',
): string | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

function causeOf(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'cause' in error
    ? error.cause
    : undefined;
}

/**
 * Timeouts, connection failures and HTTP 408/429/5xx.
 *
 * Walks the `cause` chain: fetch failures surface as a generic error wrapping
 * the socket error.
 */
export function isTransientError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    if (APICallError.isInstance(current)) {
      const status = current.statusCode;
      return (
        status === undefined || status === 408 || status === 429 || status >= 500
      );
    }
    if (stringField(current, 'name') === 'TimeoutError') {
      return true;
    }
    const code = stringField(current, 'code');
    if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
      return true;
    }
    current = causeOf(current);
  }
  return false;
}

/**
 * Sleep that ends early (resolving) when the signal aborts
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation`, retrying transient failures with exponential backoff.
 *
 * The last error is rethrown when retries are exhausted, when the failure is
 * not retryable, or when the signal aborts before the next attempt starts.
 */
export async function withRetries<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const retries = Math.max(0, options.retries);
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? abortableSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (
        attempt >= retries ||
        options.signal?.aborted ||
        !isRetryable(error)
      ) {
        throw error;
      }

      const delayMs = computeBackoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxJitterMs,
        options.random,
      );
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);

      if (options.signal?.aborted) {
        throw error;
      }
    }
  }
}
