/**
 * Local port helpers for tunnel binding
 */

import net from 'node:net';

/**
 * Check whether something already accepts TCP connections on host:port.
 *
 * A refused or timed-out connect means the port is free to bind.
 */
export function isPortInUse(port: number, host = '127.0.0.1', timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ port, host });
    const finish = (inUse: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(inUse);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

/**
 * Open a single connection to host:port and close it again.
 * Resolves true when the connection was accepted.
 */
export function canConnect(port: number, host = '127.0.0.1', timeoutMs = 2000): Promise<boolean> {
  return isPortInUse(port, host, timeoutMs);
}

/**
 * Bind `server` to host:port exclusively.
 * Rejects with the listen error (`EADDRINUSE` when the port is taken).
 */
export function listenExclusive(server: net.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen({ port, host, exclusive: true });
  });
}

/**
 * Close a server, resolving once it stops listening.
 * Already-closed servers resolve immediately.
 */
export function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
  });
}

/**
 * True for a Node system error carrying the given `code`
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
