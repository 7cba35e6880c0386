/**
 * Time source used by the polling loops.
 *
 * Readiness polling, target resolution and tunnel reconnects only read time
 * through a `Clock`, so tests can run them against a fake that advances
 * instantly instead of waiting on real timers.
 */

import { TimeoutError } from './errors';

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    }),
};

/**
 * Race `promise` against a wall-clock timer.
 * Rejects with a TimeoutError when the timer fires first; the timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
