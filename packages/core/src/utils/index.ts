/**
 * Pure utility functions shared across switchboard packages.
 */

/** Generate a random ID (nanoid-style, no deps) */
export function generateId(length = 21): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_-';
  const bytes = crypto.getRandomValues(new Uint8Array(length));
  let id = '';
  for (const byte of bytes) {
    id += chars[byte & 63];
  }
  return id;
}

/** Sleep for a given number of milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that resolves early if an AbortSignal fires.
 *
 * Retry backoff in the tool loop uses this so a dispatch timeout is not
 * delayed by a pending retry.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  if (signal.aborted) return Promise.resolve();

  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      resolve();
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Exponential backoff with jitter */
export function backoffDelay(attempt: number, baseMs = 1000, maxMs = 30_000): number {
  const delay = Math.min(baseMs * 2 ** attempt, maxMs);
  const jitter = delay * 0.1 * Math.random();
  return delay + jitter;
}

/**
 * Compact JSON with object keys sorted, so equal values always serialize to
 * the same string.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val && typeof val === 'object' && !Array.isArray(val)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(val).sort()) {
        sorted[k] = Reflect.get(val, k);
      }
      return sorted;
    }
    return val;
  });
}
