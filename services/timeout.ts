import { setTimeout } from 'timers/promises';
import { TimeoutError } from './errors.js';

/**
 * Settle with `work`, or reject with a TimeoutError once `timeoutMs` passes.
 * The underlying call is not cancelled; its late result is ignored.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  const timer = new AbortController();
  const expiry = setTimeout(timeoutMs, undefined, { signal: timer.signal }).then((): never => {
    throw new TimeoutError(operation, timeoutMs);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    timer.abort();
  }
}
