/**
 * Tunnel registry
 *
 * Tracks every open tunnel session keyed by (target name, local port).
 * A single lock guards all check-then-act sequences on the map, so a
 * concurrent open and close of the same key never interleave.
 */

import { createTimer, type Logger } from '@/lib/logger';
import { createKeyedMutex } from '@/lib/mutex';
import { systemClock, type Clock } from '@/lib/clock';
import { ERROR_MESSAGES, TimeoutError, toFailure } from '@/lib/errors';
import type { AppConfig } from '@/config/app-config';
import type { ReadinessProber } from '@/readiness/prober';
import type { ReadinessCheck } from '@/readiness/checks';
import type { TargetResolver } from '@/targets/resolver';
import type { Result, StreamConnector, Target } from '@/types';
import { createTunnelSession, type TunnelSession, type TunnelSnapshot } from './session';

const REGISTRY_LOCK = 'tunnels';
// open() holds the lock across resolution, readiness and the settle delay
const REGISTRY_LOCK_TIMEOUT_MS = 30 * 60 * 1000;

export interface OpenTunnelRequest {
  /** Logical target name; the unit name itself when no selector is given */
  target: string;
  localPort: number;
  remotePort: number;
  namespace?: string;
  /** Resolve the unit through this label selector instead of by name */
  selector?: string;
  /** Gate the tunnel on a readiness run against the resolved unit */
  readiness?: {
    checks: readonly ReadinessCheck[];
    timeoutMs: number;
  };
}

export interface TunnelRegistry {
  open(request: OpenTunnelRequest): Promise<Result<TunnelSnapshot>>;
  /** True when a session was removed; an unknown key is a no-op */
  close(targetName: string, localPort: number): Promise<boolean>;
  closeAll(): Promise<number>;
  status(targetName: string, localPort: number): TunnelSnapshot | undefined;
  list(): TunnelSnapshot[];
}

export interface TunnelRegistryDeps {
  connector: StreamConnector;
  resolver: TargetResolver;
  prober: ReadinessProber;
  logger: Logger;
  clock?: Clock;
  config: Pick<AppConfig, 'kubernetes' | 'readiness' | 'resolver' | 'tunnel'>;
  /** How long open, close and closeAll wait for another registry call */
  lockTimeoutMs?: number;
}

function keyOf(targetName: string, localPort: number): string {
  return `${targetName}:${localPort}`;
}

export function createTunnelRegistry(deps: TunnelRegistryDeps): TunnelRegistry {
  const { connector, resolver, prober, config } = deps;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: 'TunnelRegistry' });
  const lockTimeoutMs = deps.lockTimeoutMs ?? REGISTRY_LOCK_TIMEOUT_MS;
  const mutex = createKeyedMutex({ defaultTimeout: lockTimeoutMs });
  const sessions = new Map<string, TunnelSession>();

  const withRegistryLock = async <T>(
    operation: string,
    fn: () => Promise<T>,
    onTimeout: (error: TimeoutError) => T,
  ): Promise<T> => {
    let release: () => void;
    try {
      release = await mutex.acquire(REGISTRY_LOCK, lockTimeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.error({ operation, lockTimeoutMs }, 'Registry lock timeout');
        return onTimeout(error);
      }
      throw error;
    }
    try {
      return await fn();
    } finally {
      release();
    }
  };

  const removeLocked = async (key: string): Promise<boolean> => {
    const session = sessions.get(key);
    if (!session) {
      return false;
    }
    sessions.delete(key);
    await session.close();
    return true;
  };

  const resolveUnit = async (
    request: OpenTunnelRequest,
    namespace: string,
  ): Promise<Result<string>> => {
    if (request.selector) {
      return resolver.resolve(
        request.selector,
        namespace,
        config.resolver.readyTimeoutMs,
        config.resolver.pollIntervalMs,
      );
    }
    return resolver.locate({ mode: 'name', name: request.target, namespace });
  };

  return {
    open(request) {
      const lockTimeout = (error: TimeoutError): Result<TunnelSnapshot> =>
        toFailure(
          new TimeoutError(`Timed out after ${lockTimeoutMs}ms waiting for another tunnel operation`, {
            hint: error.message,
            resolution: 'Retry once the pending open or close has finished',
          }),
          { target: request.target, localPort: request.localPort },
        );

      return withRegistryLock<Result<TunnelSnapshot>>('open', async () => {
        const namespace = request.namespace ?? config.kubernetes.namespace;
        const key = keyOf(request.target, request.localPort);
        const timer = createTimer(logger, 'open-tunnel', {
          target: request.target,
          localPort: request.localPort,
        });

        if (await removeLocked(key)) {
          logger.info({ target: request.target, localPort: request.localPort }, 'Superseded existing tunnel');
        }

        const unitResult = await resolveUnit(request, namespace);
        if (!unitResult.ok) {
          timer.error(unitResult.error, { stage: 'resolve' });
          return unitResult;
        }
        const unit = unitResult.value;
        timer.checkpoint('resolved', { unit });

        if (request.readiness) {
          const target: Target = { mode: 'name', name: unit, namespace };
          const readiness = await prober.waitReady(target, request.readiness.checks, {
            timeoutMs: request.readiness.timeoutMs,
            pollIntervalMs: config.readiness.pollIntervalMs,
            probeTimeoutMs: config.readiness.probeTimeoutMs,
          });
          if (!readiness.ready) {
            timer.error(readiness.reason ?? 'timeout', { stage: 'readiness', unit });
            return toFailure<TunnelSnapshot>(
              new TimeoutError(ERROR_MESSAGES.READINESS_TIMEOUT(unit, request.readiness.timeoutMs), {
                hint: 'No readiness check passed before the tunnel was opened',
                resolution: 'Inspect the unit logs, or raise the readiness timeout',
              }),
              { target: request.target, unit, reason: readiness.reason },
            );
          }
        }

        const session = createTunnelSession(
          {
            target: request.target,
            unit,
            namespace,
            localPort: request.localPort,
            remotePort: request.remotePort,
            bindHost: config.tunnel.bindHost,
            retryLimit: config.tunnel.retryLimit,
            reconnectDelayMs: config.tunnel.reconnectDelayMs,
            settleDelayMs: config.tunnel.settleDelayMs,
          },
          { connector, logger: deps.logger, clock },
        );

        const opened = await session.open();
        if (opened.ok) {
          sessions.set(key, session);
          timer.end({ unit });
        } else {
          timer.error(opened.error, { stage: 'session', unit });
        }
        return opened;
      }, lockTimeout);
    },

    close(targetName, localPort) {
      return withRegistryLock('close', () => removeLocked(keyOf(targetName, localPort)), () => false);
    },

    closeAll() {
      return withRegistryLock('closeAll', async () => {
        let closed = 0;
        for (const key of [...sessions.keys()]) {
          if (await removeLocked(key)) {
            closed++;
          }
        }
        if (closed > 0) {
          logger.info({ closed }, 'Closed all tunnels');
        }
        return closed;
      }, () => 0);
    },

    status(targetName, localPort) {
      return sessions.get(keyOf(targetName, localPort))?.snapshot();
    },

    list() {
      return [...sessions.values()].map((session) => session.snapshot());
    },
  };
}
