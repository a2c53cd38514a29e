import { setTimeout as delay } from 'timers/promises';

/**
 * Waits for ms milliseconds; rejects as soon as the signal aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {});
};

/**
 * Delay before the retry that follows the given (1-based) failed attempt:
 * baseDelay, 2*baseDelay, 4*baseDelay, ...
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}
