/**
 * Time-bounded adapter calls
 */

import { TimeoutError } from "../schemas/errors.js";

/**
 * Race a promise against a timer. The timer is cleared either way.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Run an adapter call under a timeout, replacing a failure with `fallback`.
 * Independent calls guarded this way never block or fail one another.
 */
export async function guardAdapterCall<T>(
  label: string,
  call: () => Promise<T>,
  fallback: T,
  timeoutMs: number,
): Promise<T> {
  try {
    return await withTimeout(call(), timeoutMs, label);
  } catch (error) {
    if (error instanceof TimeoutError) {
      console.warn(`[Adapter] ${error.message}`);
    } else {
      console.error(`[Adapter] ${label} failed:`, error);
    }
    return fallback;
  }
}
