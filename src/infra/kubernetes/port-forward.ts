/**
 * Port-forward stream connector for Kubernetes pods.
 *
 * Each connection accepted by the session's listener gets its own
 * port-forward websocket to the pod. The first upstream failure, an error
 * or a close the local client did not start, rejects the relay so the
 * session can reconnect.
 */

import type net from 'node:net';
import { Writable } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import type { Logger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import type { RelayRequest, StreamConnector } from '@/types';

export function createKubernetesStreamConnector(kc: k8s.KubeConfig, logger: Logger): StreamConnector {
  const forwarder = new k8s.PortForward(kc);
  const log = logger.child({ component: 'PortForward' });

  return {
    relay({ namespace, unit, remotePort, listener, signal }: RelayRequest): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          resolve();
          return;
        }

        let settled = false;
        const cleanup = (): void => {
          settled = true;
          listener.off('connection', onConnection);
          listener.off('error', onFailure);
          signal.removeEventListener('abort', onAbort);
        };
        const onAbort = (): void => {
          if (settled) return;
          cleanup();
          resolve();
        };
        const onFailure = (error: unknown): void => {
          if (settled) return;
          cleanup();
          reject(error instanceof Error ? error : new Error(extractErrorMessage(error)));
        };

        function onConnection(socket: net.Socket): void {
          let localClosed = false;
          let closeStream: (() => void) | undefined;
          socket.on('error', (error) => {
            log.debug({ unit, error: error.message }, 'Local socket error');
          });
          socket.once('end', () => {
            localClosed = true;
          });
          socket.once('close', () => {
            localClosed = true;
            closeStream?.();
          });

          const errorChannel = new Writable({
            write(chunk: Buffer, _encoding, callback) {
              log.debug(
                { namespace, unit, remotePort, error: chunk.toString('utf-8').trim() },
                'Port-forward error channel',
              );
              callback();
            },
          });

          forwarder
            .portForward(namespace, unit, [remotePort], socket, errorChannel, socket)
            .then((result) => {
              const ws = typeof result === 'function' ? result() : result;
              if (!ws) {
                socket.destroy();
                onFailure(new Error(`Port-forward to ${unit} opened no stream`));
                return;
              }
              if (socket.destroyed) {
                ws.close();
                return;
              }
              closeStream = () => ws.close();
              ws.on('error', (error: Error) => {
                socket.destroy();
                onFailure(error);
              });
              // The client-side half-close also closes the stream; only a remote close is a failure
              ws.on('close', (code: number) => {
                if (localClosed || signal.aborted) return;
                socket.destroy();
                onFailure(new Error(`Port-forward stream to ${unit} closed (code ${code})`));
              });
            })
            .catch((error: unknown) => {
              log.debug({ namespace, unit, remotePort, error: extractErrorMessage(error) }, 'Port-forward stream failed');
              socket.destroy();
              onFailure(error);
            });
        }

        listener.on('connection', onConnection);
        listener.on('error', onFailure);
        signal.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}
