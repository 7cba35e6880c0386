/**
 * Tunnel session: one local port forwarded to one remote unit.
 *
 * INIT → BINDING → RELAYING ⇄ RECONNECTING → CLOSED, with FAILED reachable
 * from BINDING or RECONNECTING. A background worker owns the relay and the
 * reconnect loop; only the worker and `close` change state after `open`.
 */

import net from 'node:net';
import type { Logger } from '@/lib/logger';
import { systemClock, type Clock } from '@/lib/clock';
import {
  ERROR_MESSAGES,
  PodgateError,
  PortInUseError,
  RetryExhaustedError,
  TimeoutError,
  extractErrorMessage,
  toFailure,
} from '@/lib/errors';
import { canConnect, closeServer, hasErrorCode, isPortInUse, listenExclusive } from '@/lib/port-utils';
import { DEFAULT_TIMEOUTS, DEFAULT_TUNNEL } from '@/config/constants';
import { Failure, Success, type Result, type StreamConnector } from '@/types';

export type TunnelState = 'INIT' | 'BINDING' | 'RELAYING' | 'RECONNECTING' | 'CLOSED' | 'FAILED';

export interface TunnelSnapshot {
  /** Logical target name the registry keys on */
  target: string;
  /** Concrete pod or container name */
  unit: string;
  namespace: string;
  localPort: number;
  remotePort: number;
  state: TunnelState;
  retryCount: number;
  lastError?: { code?: string; message: string };
}

export interface TunnelSessionOptions {
  target: string;
  unit: string;
  namespace: string;
  localPort: number;
  remotePort: number;
  bindHost?: string;
  retryLimit?: number;
  reconnectDelayMs?: number;
  settleDelayMs?: number;
  livenessTimeoutMs?: number;
}

export interface TunnelSessionDeps {
  connector: StreamConnector;
  logger: Logger;
  clock?: Clock;
}

export interface TunnelSession {
  readonly target: string;
  readonly localPort: number;
  /** Bind, start relaying and verify the port answers. Callable once. */
  open(): Promise<Result<TunnelSnapshot>>;
  /** Release the port and stop the worker. Safe to call repeatedly. */
  close(): Promise<void>;
  snapshot(): TunnelSnapshot;
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export function createTunnelSession(
  options: TunnelSessionOptions,
  deps: TunnelSessionDeps,
): TunnelSession {
  const { target, unit, namespace, localPort, remotePort } = options;
  const bindHost = options.bindHost ?? DEFAULT_TUNNEL.bindHost;
  const retryLimit = options.retryLimit ?? DEFAULT_TUNNEL.retryLimit;
  const reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_TIMEOUTS.tunnelReconnect;
  const settleDelayMs = options.settleDelayMs ?? DEFAULT_TIMEOUTS.tunnelSettle;
  const livenessTimeoutMs = options.livenessTimeoutMs ?? DEFAULT_TIMEOUTS.livenessConnect;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger.child({ component: 'TunnelSession', target, unit, localPort, remotePort });

  const abort = new AbortController();
  const sockets = new Set<net.Socket>();
  // Accepted while no relay handler was attached; handed to the next one
  const pending = new Set<net.Socket>();
  let server: net.Server | undefined;
  let worker: Promise<void> | undefined;
  let state: TunnelState = 'INIT';
  let retryCount = 0;
  let lastError: unknown;

  // The worker mutates state across awaits; read it through here after one
  const currentState = (): TunnelState => state;

  const snapshot = (): TunnelSnapshot => {
    const snap: TunnelSnapshot = {
      target,
      unit,
      namespace,
      localPort,
      remotePort,
      state,
      retryCount,
    };
    if (lastError !== undefined) {
      snap.lastError =
        lastError instanceof PodgateError
          ? { code: lastError.code, message: lastError.message }
          : { message: extractErrorMessage(lastError) };
    }
    return snap;
  };

  const releasePort = async (): Promise<void> => {
    for (const socket of sockets) {
      socket.destroy();
    }
    sockets.clear();
    pending.clear();
    if (server) {
      await closeServer(server);
    }
  };

  const runWorker = async (listener: net.Server): Promise<void> => {
    const { signal } = abort;

    while (!signal.aborted) {
      try {
        await deps.connector.relay({ namespace, unit, remotePort, listener, signal });
        return;
      } catch (error) {
        if (signal.aborted) return;
        lastError = error;

        if (retryCount >= retryLimit) {
          const exhausted = new RetryExhaustedError(retryCount, error);
          lastError = exhausted;
          state = 'FAILED';
          logger.error({ retryCount, error: extractErrorMessage(error) }, exhausted.message);
          await releasePort();
          return;
        }

        state = 'RECONNECTING';
        retryCount++;
        logger.warn(
          { attempt: retryCount, retryLimit, error: extractErrorMessage(error) },
          'Port-forward dropped, reconnecting',
        );
        await Promise.race([clock.sleep(reconnectDelayMs), untilAborted(signal)]);
        if (signal.aborted) return;
        state = 'RELAYING';
      }
    }
  };

  const fail = async <T>(error: PodgateError): Promise<Result<T>> => {
    lastError = error;
    state = 'FAILED';
    await releasePort();
    return toFailure(error, { target, localPort });
  };

  const close = async (): Promise<void> => {
    if (state === 'CLOSED') return;
    state = 'CLOSED';
    abort.abort();
    await releasePort();
    if (worker) {
      await worker;
    }
    logger.info('Port-forward closed');
  };

  const open = async (): Promise<Result<TunnelSnapshot>> => {
    if (state !== 'INIT') {
      return Failure(`Tunnel session for ${target} on port ${localPort} was already opened`);
    }

    state = 'BINDING';
    if (await isPortInUse(localPort, bindHost)) {
      return fail(new PortInUseError(localPort));
    }

    const listener = net.createServer();
    // The session's own handler is always the first 'connection' listener
    const relayAttached = (): boolean => listener.listenerCount('connection') > 1;
    listener.on('connection', (socket: net.Socket) => {
      if (!sockets.has(socket)) {
        sockets.add(socket);
        socket.once('close', () => {
          sockets.delete(socket);
          pending.delete(socket);
        });
      }
      if (!relayAttached()) {
        logger.debug({ state }, 'Connection accepted while the relay is down, holding it');
        pending.add(socket);
      }
    });
    listener.on('newListener', (event: string | symbol) => {
      if (event !== 'connection' || pending.size === 0) return;
      // Runs once the relay's handler has actually been added
      queueMicrotask(() => {
        for (const socket of [...pending]) {
          if (!relayAttached()) return;
          pending.delete(socket);
          if (!socket.destroyed) {
            listener.emit('connection', socket);
          }
        }
      });
    });
    try {
      await listenExclusive(listener, localPort, bindHost);
    } catch (error) {
      if (hasErrorCode(error, 'EADDRINUSE')) {
        return fail(new PortInUseError(localPort));
      }
      state = 'FAILED';
      lastError = error;
      return Failure(`Cannot bind ${bindHost}:${localPort}: ${extractErrorMessage(error)}`, {
        message: `Cannot bind ${bindHost}:${localPort}`,
        hint: extractErrorMessage(error),
        resolution: 'Check the bind host and that the process may listen on this port',
        details: { target, localPort },
      });
    }
    server = listener;
    // Errors after a successful bind are surfaced by the liveness probe
    listener.on('error', (error) => {
      logger.debug({ error: extractErrorMessage(error) }, 'Listener error');
    });

    state = 'RELAYING';
    logger.info({ namespace }, 'Port-forward starting');
    worker = runWorker(listener);

    await Promise.race([clock.sleep(settleDelayMs), untilAborted(abort.signal)]);

    const current = currentState();
    if (current === 'FAILED') {
      const failure = lastError instanceof PodgateError ? lastError : new RetryExhaustedError(retryCount);
      await close();
      return toFailure(failure, { target, localPort });
    }
    if (current === 'CLOSED') {
      return Failure(`Tunnel session for ${target} on port ${localPort} was closed while opening`);
    }

    if (!(await canConnect(localPort, bindHost, livenessTimeoutMs))) {
      const error = new TimeoutError(ERROR_MESSAGES.TUNNEL_LIVENESS_FAILED(localPort, unit), {
        hint: 'The local listener did not accept a test connection',
        resolution: 'Check that the pod is running and the remote port is correct',
      });
      lastError = error;
      await close();
      return toFailure(error, { target, localPort });
    }

    logger.info({ bindHost }, 'Port-forward established');
    return Success(snapshot());
  };

  return {
    target,
    localPort,
    open,
    close,
    snapshot,
  };
}
