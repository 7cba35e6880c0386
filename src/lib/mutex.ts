import { randomUUID } from 'node:crypto';
import { TimeoutError } from './errors';

interface Waiter {
  wake: () => void;
  timer?: NodeJS.Timeout;
}

interface MutexState {
  locked: boolean;
  queue: Waiter[];
  holderId?: string;
}

interface KeyedMutexOptions {
  defaultTimeout: number;
}

export interface KeyedMutexInstance {
  acquire(key: string, timeoutMs?: number): Promise<() => void>;
  withLock<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T>;
}

/**
 * Creates a keyed mutex. Each key has its own FIFO wait queue, so
 * different keys never block each other.
 *
 * `acquire` rejects with a `TimeoutError` once `timeoutMs` passes without
 * the lock.
 */
export const createKeyedMutex = (options?: Partial<KeyedMutexOptions>): KeyedMutexInstance => {
  const locks = new Map<string, MutexState>();
  const config: KeyedMutexOptions = {
    defaultTimeout: 30000,
    ...options,
  };

  const stateFor = (key: string): MutexState => {
    let lock = locks.get(key);
    if (!lock) {
      lock = { locked: false, queue: [] };
      locks.set(key, lock);
    }
    return lock;
  };

  const acquire = async (key: string, timeoutMs?: number): Promise<() => void> => {
    const timeout = timeoutMs ?? config.defaultTimeout;
    const holderId = randomUUID();
    const lock = stateFor(key);
    const deadline = Date.now() + timeout;

    while (lock.locked) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(`Mutex timeout for key: ${key} (waited ${timeout}ms)`);
      }

      await new Promise<void>((resolve) => {
        const waiter: Waiter = {
          wake: () => {
            if (waiter.timer) clearTimeout(waiter.timer);
            resolve();
          },
        };
        waiter.timer = setTimeout(() => {
          const idx = lock.queue.indexOf(waiter);
          if (idx >= 0) lock.queue.splice(idx, 1);
          resolve();
        }, remaining);
        lock.queue.push(waiter);
      });
    }

    lock.locked = true;
    lock.holderId = holderId;

    return (): void => {
      if (lock.holderId !== holderId) {
        throw new Error(`Lock release attempted by non-holder for key: ${key}`);
      }

      lock.locked = false;
      delete lock.holderId;

      const next = lock.queue.shift();
      if (next) {
        next.wake();
      } else if (locks.get(key) === lock) {
        locks.delete(key);
      }
    };
  };

  const withLock = async <T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> => {
    const release = await acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  };

  return { acquire, withLock };
};
