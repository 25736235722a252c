/** First retry delay after a failed scan cycle */
export const BACKOFF_BASE_MS = 1000;

/** Longest delay between scan retries */
export const BACKOFF_CAP_MS = 60_000;

/**
 * Exponential backoff: 1s, 2s, 4s, 8s, 16s, 32s, 60s (max).
 *
 * @param attempt - Consecutive failures so far, starting at 0
 */
export function backoffDelay(attempt: number, base = BACKOFF_BASE_MS, cap = BACKOFF_CAP_MS): number {
  if (attempt <= 0) {
    return Math.min(base, cap);
  }
  return Math.min(base * Math.pow(2, attempt), cap);
}
