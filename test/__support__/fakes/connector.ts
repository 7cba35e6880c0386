import type { RelayRequest, StreamConnector } from '@/types';

/**
 * `hold` keeps the relay running until the session aborts or `drop()` is
 * called; `fail` rejects at once.
 */
export type RelayStep = 'hold' | 'fail';

export interface FakeConnector extends StreamConnector {
  /** Relay calls made so far */
  readonly calls: RelayRequest[];
  /** Reject the relay currently held; false when none is held */
  drop(error?: Error): boolean;
}

/**
 * Connector that follows `script` call by call; once the script runs out,
 * `fallback` applies to every further call.
 */
export function createFakeConnector(script: RelayStep[] = [], fallback: RelayStep = 'hold'): FakeConnector {
  const calls: RelayRequest[] = [];
  let held: ((error: Error) => void) | undefined;

  return {
    calls,

    relay(request) {
      const step = script[calls.length] ?? fallback;
      calls.push(request);

      if (step === 'fail') {
        return Promise.reject(new Error(`relay ${calls.length} dropped`));
      }

      return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
          held = undefined;
          resolve();
        };
        held = (error) => {
          held = undefined;
          request.signal.removeEventListener('abort', onAbort);
          reject(error);
        };
        if (request.signal.aborted) {
          onAbort();
          return;
        }
        request.signal.addEventListener('abort', onAbort, { once: true });
      });
    },

    drop(error = new Error('stream reset')) {
      if (!held) return false;
      held(error);
      return true;
    },
  };
}
