/**
 * Stream connector for Docker containers.
 *
 * Docker has no port-forward API; each accepted connection is piped to the
 * container's address on its network. The container is looked up once per
 * relay run, so a restarted container is picked up on reconnect.
 */

import net from 'node:net';
import type { Logger } from '@/lib/logger';
import { ERROR_MESSAGES, NotFoundError, extractErrorMessage } from '@/lib/errors';
import type { RelayRequest, StreamConnector } from '@/types';
import type { DockerClient } from './client';

async function lookupAddress(client: DockerClient, unit: string): Promise<string> {
  const container = await client.getContainer(unit);
  if (!container.ok) {
    throw new Error(container.error);
  }
  if (!container.value?.running) {
    throw new NotFoundError(ERROR_MESSAGES.TARGET_NOT_FOUND(unit, 'docker'));
  }
  if (!container.value.address) {
    throw new Error(`Container ${unit} has no network address`);
  }
  return container.value.address;
}

export function createDockerStreamConnector(client: DockerClient, logger: Logger): StreamConnector {
  const log = logger.child({ component: 'DockerRelay' });

  return {
    async relay({ unit, remotePort, listener, signal }: RelayRequest): Promise<void> {
      if (signal.aborted) return;
      const address = await lookupAddress(client, unit);

      await new Promise<void>((resolve, reject) => {
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
          const upstream = net.connect({ host: address, port: remotePort });
          socket.on('error', (error) => {
            log.debug({ unit, error: error.message }, 'Local socket error');
            upstream.destroy();
          });
          upstream.on('error', (error) => {
            log.debug({ unit, address, remotePort, error: error.message }, 'Upstream connection failed');
            socket.destroy();
            onFailure(error);
          });
          socket.pipe(upstream);
          upstream.pipe(socket);
        }

        if (signal.aborted) {
          onAbort();
          return;
        }
        listener.on('connection', onConnection);
        listener.on('error', onFailure);
        signal.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}
