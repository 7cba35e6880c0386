import net from 'node:net';
import { createLogger, type Logger } from '@/lib/logger';

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Ask the OS for a free loopback port, then release it
 */
export function getFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('Expected a TCP address'));
        return;
      }
      server.close(() => resolve(address.port));
    });
  });
}

/**
 * Listen on a free loopback port and return the bound server
 */
export async function occupyPort(): Promise<{ server: net.Server; port: number }> {
  const server = net.createServer((socket) => socket.end());
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { server, port: address.port };
}

export function closeQuietly(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/**
 * Run event-loop turns until `condition` holds
 */
export async function waitFor(condition: () => boolean, turns = 200): Promise<void> {
  for (let i = 0; i < turns; i++) {
    if (condition()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error('Condition not met');
}
