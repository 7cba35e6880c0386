import { describe, it, expect, afterEach, beforeEach, jest } from '@jest/globals';
import net from 'node:net';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import WebSocket from 'ws';
import { createKubernetesStreamConnector } from '@/infra/kubernetes/port-forward';
import { silentLogger, waitFor } from '../../../__support__/utilities/net-helpers';

/**
 * A websocket that never connects; tests drive it by emitting events
 */
function detachedWebSocket(): WebSocket {
  const ws = new WebSocket(null);
  jest.spyOn(ws, 'close').mockImplementation(() => undefined);
  return ws;
}

describe('Kubernetes stream connector', () => {
  let listener: net.Server;
  let port: number;
  let abort: AbortController;
  const clients: net.Socket[] = [];

  beforeEach(async () => {
    listener = net.createServer();
    listener.listen(0, '127.0.0.1');
    await once(listener, 'listening');
    const address = listener.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    port = address.port;
    abort = new AbortController();
  });

  afterEach(async () => {
    abort.abort();
    clients.splice(0).forEach((client) => client.destroy());
    await new Promise<void>((resolve) => listener.close(() => resolve()));
    jest.restoreAllMocks();
  });

  function startRelay(): Promise<void> {
    const connector = createKubernetesStreamConnector(new k8s.KubeConfig(), silentLogger());
    return connector.relay({
      namespace: 'streaming',
      unit: 'kafka-0',
      remotePort: 9092,
      listener,
      signal: abort.signal,
    });
  }

  async function connectClient(): Promise<net.Socket> {
    const client = net.connect({ host: '127.0.0.1', port });
    client.on('error', () => undefined);
    clients.push(client);
    await once(client, 'connect');
    return client;
  }

  it('opens one port-forward per accepted connection', async () => {
    const ws = detachedWebSocket();
    const portForward = jest.spyOn(k8s.PortForward.prototype, 'portForward').mockResolvedValue(ws);
    const relay = startRelay();

    await connectClient();
    await waitFor(() => portForward.mock.calls.length === 1, 1000);

    const call = portForward.mock.calls[0];
    expect(call?.slice(0, 3)).toEqual(['streaming', 'kafka-0', [9092]]);
    expect(call?.[3]).toBe(call?.[5]);
    expect(call?.[4]).not.toBeNull();

    abort.abort();
    await expect(relay).resolves.toBeUndefined();
  });

  it('rejects the relay and closes the client when the remote side closes the stream', async () => {
    const ws = detachedWebSocket();
    const portForward = jest.spyOn(k8s.PortForward.prototype, 'portForward').mockResolvedValue(ws);
    const relay = startRelay();
    const client = await connectClient();
    await waitFor(() => portForward.mock.calls.length === 1 && ws.listenerCount('close') > 0, 1000);

    const clientClosed = once(client, 'close');
    ws.emit('close', 1006, Buffer.alloc(0));

    await expect(relay).rejects.toThrow('Port-forward stream to kafka-0 closed (code 1006)');
    await clientClosed;
    expect(client.destroyed).toBe(true);
  });

  it('rejects the relay when the stream errors', async () => {
    const ws = detachedWebSocket();
    const portForward = jest.spyOn(k8s.PortForward.prototype, 'portForward').mockResolvedValue(ws);
    const relay = startRelay();
    await connectClient();
    await waitFor(() => portForward.mock.calls.length === 1 && ws.listenerCount('error') > 0, 1000);

    ws.emit('error', new Error('unexpected server response: 500'));

    await expect(relay).rejects.toThrow('unexpected server response: 500');
  });

  it('rejects the relay when the port-forward cannot be opened', async () => {
    jest.spyOn(k8s.PortForward.prototype, 'portForward').mockRejectedValue(new Error('pods "kafka-0" not found'));
    const rejected = expect(startRelay()).rejects.toThrow('pods "kafka-0" not found');

    await connectClient();

    await rejected;
  });

  it('keeps relaying when the local client hangs up', async () => {
    const ws = detachedWebSocket();
    const portForward = jest.spyOn(k8s.PortForward.prototype, 'portForward').mockResolvedValue(ws);
    let settled = false;
    const relay = startRelay().finally(() => {
      settled = true;
    });
    const client = await connectClient();
    await waitFor(() => portForward.mock.calls.length === 1 && ws.listenerCount('close') > 0, 1000);

    client.end();
    await waitFor(() => jest.mocked(ws.close).mock.calls.length === 1, 1000);
    ws.emit('close', 1000, Buffer.alloc(0));
    await new Promise((resolve) => setImmediate(resolve));

    expect(settled).toBe(false);
    abort.abort();
    await expect(relay).resolves.toBeUndefined();
  });

  it('logs the error channel without failing the relay', async () => {
    const ws = detachedWebSocket();
    const portForward = jest.spyOn(k8s.PortForward.prototype, 'portForward').mockResolvedValue(ws);
    let settled = false;
    const relay = startRelay().finally(() => {
      settled = true;
    });
    await connectClient();
    await waitFor(() => portForward.mock.calls.length === 1, 1000);

    const errorChannel: Writable | null | undefined = portForward.mock.calls[0]?.[4];
    errorChannel?.write('connection refused');
    await new Promise((resolve) => setImmediate(resolve));

    expect(settled).toBe(false);
    abort.abort();
    await expect(relay).resolves.toBeUndefined();
  });
});
