/**
 * Readiness prober
 *
 * Polls a target with an ordered list of checks until one passes or the
 * budget runs out. Individual probe failures never escape: they are logged
 * at debug and count as "not ready yet".
 */

import type { Logger } from '@/lib/logger';
import { systemClock, withTimeout, type Clock } from '@/lib/clock';
import {
  ERROR_MESSAGES,
  InvalidArgumentError,
  TransientProbeError,
  extractErrorMessage,
} from '@/lib/errors';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { failureCode, type Result, type Target, type WorkloadRuntime } from '@/types';
import type { TargetResolver } from '@/targets/resolver';
import { logPatternCheck, orderChecks, type ReadinessCheck } from './checks';

export interface ReadinessResult {
  ready: boolean;
  /** Name of the first check that passed, by priority */
  satisfiedBy: string | null;
  elapsedMs: number;
  /** Concrete unit that was probed, once located */
  unit: string | null;
  /** Polling passes started */
  passes: number;
  reason?: 'not-found' | 'timeout';
}

export interface WaitReadyOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  probeTimeoutMs?: number;
}

export interface ReadinessProber {
  waitReady(
    target: Target,
    checks: readonly ReadinessCheck[],
    options: WaitReadyOptions,
  ): Promise<ReadinessResult>;
  /** Wait until the unit's logs contain `pattern` */
  waitForLog(
    target: Target,
    pattern: RegExp | string,
    timeoutMs: number,
    pollIntervalMs?: number,
  ): Promise<ReadinessResult>;
}

export interface ReadinessProberDeps {
  runtime: WorkloadRuntime;
  resolver: TargetResolver;
  logger: Logger;
  clock?: Clock;
}

const LOG_WAIT_POLL_MS = 1000;

type CheckOutcome = 'satisfied' | 'unsatisfied' | 'gone';

function describeTarget(target: Target): string {
  return target.mode === 'name' ? target.name : target.selector;
}

export function createReadinessProber(deps: ReadinessProberDeps): ReadinessProber {
  const { runtime, resolver } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: 'ReadinessProber' });

  function runProbe(
    target: Target,
    unit: string,
    check: ReadinessCheck,
    timeoutMs: number,
  ): Promise<Result<string>> {
    if (check.probe.kind === 'exec') {
      return runtime.exec(target.namespace, unit, [...check.probe.command], timeoutMs);
    }
    const { tailLines } = check.probe;
    return runtime.logs(target.namespace, unit, tailLines === undefined ? {} : { tailLines });
  }

  async function evaluate(
    target: Target,
    unit: string,
    check: ReadinessCheck,
    defaultProbeTimeoutMs: number,
  ): Promise<CheckOutcome> {
    const probeTimeoutMs = check.timeoutMs ?? defaultProbeTimeoutMs;
    try {
      const output = await withTimeout(
        runProbe(target, unit, check, probeTimeoutMs),
        probeTimeoutMs,
        `Probe ${check.name}`,
      );
      if (!output.ok) {
        if (failureCode(output) === 'NOT_FOUND') {
          logger.debug({ check: check.name, unit, error: output.error }, 'Unit under check is gone');
          return 'gone';
        }
        throw new TransientProbeError(output.error);
      }
      return check.isSatisfied(output.value) ? 'satisfied' : 'unsatisfied';
    } catch (error) {
      logger.debug(
        { check: check.name, unit, error: extractErrorMessage(error) },
        'Readiness probe failed',
      );
      return 'unsatisfied';
    }
  }

  async function waitReady(
    target: Target,
    checks: readonly ReadinessCheck[],
    options: WaitReadyOptions,
  ): Promise<ReadinessResult> {
    if (checks.length === 0) {
      throw new InvalidArgumentError('At least one readiness check is required');
    }
    if (!(options.timeoutMs > 0)) {
      throw new InvalidArgumentError(`Readiness timeout must be positive, got ${options.timeoutMs}`);
    }

    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TIMEOUTS.readinessPoll;
    const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_TIMEOUTS.readinessProbe;
    const ordered = orderChecks(checks);
    const startedAt = clock.now();
    const deadline = startedAt + options.timeoutMs;
    const label = describeTarget(target);

    let unit: string | null = null;
    // A selector target whose unit vanished is located again, even if briefly nothing matches
    let relocating = false;
    let passes = 0;

    const finish = (
      ready: boolean,
      satisfiedBy: string | null,
      reason?: 'not-found' | 'timeout',
    ): ReadinessResult => {
      const result: ReadinessResult = {
        ready,
        satisfiedBy,
        elapsedMs: clock.now() - startedAt,
        unit,
        passes,
      };
      if (reason) result.reason = reason;
      return result;
    };

    logger.debug(
      { target: label, namespace: target.namespace, checks: ordered.map((c) => c.name) },
      'Waiting for readiness',
    );

    for (;;) {
      if (unit === null) {
        const located = await resolver.locate(target);
        if (located.ok) {
          unit = located.value;
        } else if (failureCode(located) === 'NOT_FOUND' && !relocating) {
          logger.info({ target: label, namespace: target.namespace }, 'Readiness target not found');
          return finish(false, null, 'not-found');
        } else {
          logger.debug({ target: label, error: located.error }, 'Target lookup failed, retrying');
        }
      }

      if (unit !== null) {
        passes++;
        for (const check of ordered) {
          if (clock.now() >= deadline) {
            logger.warn(
              { target: label, unit, timeoutMs: options.timeoutMs },
              ERROR_MESSAGES.READINESS_TIMEOUT(label, options.timeoutMs),
            );
            return finish(false, null, 'timeout');
          }
          const outcome = await evaluate(target, unit, check, probeTimeoutMs);
          if (outcome === 'satisfied') {
            const result = finish(true, check.name);
            logger.info(
              { target: label, unit, check: check.name, elapsedMs: result.elapsedMs },
              'Target is ready',
            );
            return result;
          }
          if (outcome === 'gone' && target.mode === 'selector') {
            logger.info({ target: label, unit }, 'Unit disappeared, locating a replacement');
            unit = null;
            relocating = true;
            break;
          }
        }
      }

      const remaining = deadline - clock.now();
      if (remaining <= 0) {
        logger.warn(
          { target: label, unit, timeoutMs: options.timeoutMs },
          ERROR_MESSAGES.READINESS_TIMEOUT(label, options.timeoutMs),
        );
        return finish(false, null, 'timeout');
      }
      await clock.sleep(Math.min(pollIntervalMs, remaining));
    }
  }

  return {
    waitReady,

    waitForLog(target, pattern, timeoutMs, pollIntervalMs = LOG_WAIT_POLL_MS) {
      return waitReady(target, [logPatternCheck('log-pattern', 0, pattern)], {
        timeoutMs,
        pollIntervalMs,
      });
    },
  };
}
