import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import * as k8s from '@kubernetes/client-node';

/**
 * Kubeconfig pointing at a loopback API server nothing listens on
 */
export function testKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: [{ name: 'test-cluster', server: 'https://127.0.0.1:6443', skipTLSVerify: true }],
    users: [{ name: 'test-user', token: 'test-secret' }],
    contexts: [{ name: 'test-context', cluster: 'test-cluster', user: 'test-user' }],
    currentContext: 'test-context',
  });
  return kc;
}

/**
 * Shaped like the errors the generated API clients reject with
 */
export function apiError(statusCode: number, message: string): Error {
  return Object.assign(new Error('HTTP request failed'), {
    response: { statusCode },
    body: { message },
  });
}

export function apiResponse(): IncomingMessage {
  return new IncomingMessage(new Socket());
}
