/**
 * Utility function to create a delay/sleep in async code
 * @param ms - Milliseconds to wait
 *
 * @example
 * await delay(1000); // Wait 1 second
 */
export const delay = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Adds jitter (randomness) to a delay so that retrying callers spread out
 * @param baseDelayMs - Base delay in milliseconds
 * @param jitterPercent - Percentage of jitter (0-100), default 20%
 */
export const delayWithJitter = (
  baseDelayMs: number,
  jitterPercent: number = 20,
): Promise<void> => {
  const jitter = (baseDelayMs * jitterPercent) / 100;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  const delayMs = Math.max(0, baseDelayMs + randomJitter);
  return delay(delayMs);
};

/**
 * Parse a Retry-After header value
 * @param retryAfter - Number of seconds, or an HTTP date string
 * @param fallbackMs - Used when the header is absent or unparseable
 * @returns Milliseconds to wait
 */
export const parseRetryAfter = (
  retryAfter: string | number | undefined,
  fallbackMs: number = 1000,
): number => {
  if (retryAfter === undefined || retryAfter === '') return fallbackMs;

  if (typeof retryAfter === 'number') {
    return retryAfter * 1000;
  }

  const seconds = Number.parseInt(retryAfter, 10);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!Number.isNaN(retryDate.getTime())) {
    return Math.max(retryDate.getTime() - Date.now(), 0);
  }

  return fallbackMs;
};
