/**
 * Target resolution: label selector → one concrete unit name.
 *
 * When several units are ready the first in listing order wins. The
 * platforms make no ordering guarantee, so which replica is picked is
 * not stable across calls.
 */

import type { Logger } from '@/lib/logger';
import { systemClock, type Clock } from '@/lib/clock';
import { ERROR_MESSAGES, NotFoundError, toFailure } from '@/lib/errors';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { Success, type Result, type Target, type WorkloadRuntime } from '@/types';

export interface TargetResolver {
  /**
   * Poll until a unit matching `selector` is running and ready.
   * Fails with code NOT_FOUND when none is ready by the deadline.
   */
  resolve(
    selector: string,
    namespace: string,
    readyTimeoutMs: number,
    pollIntervalMs?: number,
  ): Promise<Result<string>>;
  /**
   * One-shot lookup. Explicit names must exist; selectors pick the first
   * ready unit, else the first listed one.
   */
  locate(target: Target): Promise<Result<string>>;
}

export interface TargetResolverDeps {
  runtime: WorkloadRuntime;
  logger: Logger;
  clock?: Clock;
}

export function createTargetResolver(deps: TargetResolverDeps): TargetResolver {
  const { runtime } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: 'TargetResolver' });

  return {
    async resolve(selector, namespace, readyTimeoutMs, pollIntervalMs = DEFAULT_TIMEOUTS.resolverPoll) {
      const deadline = clock.now() + readyTimeoutMs;

      for (;;) {
        const listed = await runtime.list(namespace, selector);
        if (listed.ok) {
          const ready = listed.value.find((unit) => unit.ready);
          if (ready) {
            logger.debug({ selector, namespace, unit: ready.name }, 'Resolved target');
            return Success(ready.name);
          }
          logger.debug(
            { selector, namespace, matched: listed.value.length },
            'No ready unit yet',
          );
        } else {
          logger.debug({ selector, namespace, error: listed.error }, 'Listing units failed');
        }

        const remaining = deadline - clock.now();
        if (remaining <= 0) {
          logger.warn({ selector, namespace, readyTimeoutMs }, 'No ready unit before deadline');
          return toFailure(
            new NotFoundError(ERROR_MESSAGES.TARGET_NOT_READY(selector, namespace, readyTimeoutMs), {
              hint: 'No unit matching the selector reached running and ready in time',
              resolution: 'Check the selector labels and the workload status, or raise the ready timeout',
            }),
            { selector, namespace },
          );
        }
        await clock.sleep(Math.min(pollIntervalMs, remaining));
      }
    },

    async locate(target) {
      if (target.mode === 'name') {
        const found = await runtime.get(target.namespace, target.name);
        if (!found.ok) {
          return found;
        }
        if (found.value === null) {
          return toFailure(
            new NotFoundError(ERROR_MESSAGES.TARGET_NOT_FOUND(target.name, target.namespace)),
            { name: target.name, namespace: target.namespace },
          );
        }
        return Success(found.value.name);
      }

      const listed = await runtime.list(target.namespace, target.selector);
      if (!listed.ok) {
        return listed;
      }
      const chosen = listed.value.find((unit) => unit.ready) ?? listed.value[0];
      if (!chosen) {
        return toFailure(
          new NotFoundError(ERROR_MESSAGES.TARGET_NOT_FOUND(target.selector, target.namespace)),
          { selector: target.selector, namespace: target.namespace },
        );
      }
      return Success(chosen.name);
    },
  };
}
