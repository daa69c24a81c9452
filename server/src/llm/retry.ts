/**
 * Retry & Error Detection
 *
 * Decides whether an upstream failure is transient, extracts Retry-After
 * hints, and retries with exponential backoff plus full jitter.
 */

// ============================================
// RETRYABLE ERROR DETECTION
// ============================================

/** HTTP status codes that indicate a transient failure */
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

/** Message fragments that indicate a transient failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "too many requests",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "network",
  "socket hang up",
];

export function isRetryableError(error: unknown): boolean {
  // An abort is the caller giving up; retrying would outlive its deadline
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return false;
  }

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();

  for (const code of RETRYABLE_STATUS_CODES) {
    if (new RegExp(`\\b${code}\\b`).test(msg)) return true;
  }
  return RETRYABLE_PATTERNS.some(pattern => msg.includes(pattern));
}

/**
 * Retry-After delay in ms from an error message, or 0 if absent.
 * Hints above 30 seconds are ignored.
 */
export function extractRetryAfterMs(error: unknown): number {
  const msg = error instanceof Error ? error.message : String(error);
  const match = msg.match(/retry[- ]after:?\s*(\d+)/i);
  if (match) {
    const seconds = parseInt(match[1], 10);
    return seconds <= 30 ? seconds * 1000 : 0;
  }
  return 0;
}

// ============================================
// BACKOFF
// ============================================

export interface RetryOptions {
  /** Retries after the first attempt (default: 2) */
  retries?: number;
  /** Base delay for attempt 1 (default: 250ms) */
  baseDelayMs?: number;
  /** Ceiling for any single delay (default: 4s) */
  maxDelayMs?: number;
  /** Stop waiting and rethrow once aborted */
  signal?: AbortSignal;
  /** Injection point for tests */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Full jitter: uniform in [0, min(cap, base * 2^(attempt-1))], or the server's Retry-After if larger */
export function backoffDelay(
  attempt: number,
  error: unknown,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "random"> = {},
): number {
  const base = options.baseDelayMs ?? 250;
  const cap = options.maxDelayMs ?? 4000;
  const random = options.random ?? Math.random;

  const ceiling = Math.min(cap, base * 2 ** (attempt - 1));
  const jittered = Math.floor(random() * ceiling);
  return Math.max(jittered, extractRetryAfterMs(error));
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const retries = options.retries ?? 2;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= retries || !isRetryableError(error) || options.signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt + 1, error, options);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
      if (options.signal?.aborted) throw error;
    }
  }
}
