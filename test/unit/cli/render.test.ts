import { describe, it, expect } from '@jest/globals';
import { formatReadiness, formatTunnel } from '@/cli/render';
import type { TunnelSnapshot } from '@/tunnel/session';

const base: TunnelSnapshot = {
  target: 'kafka',
  unit: 'kafka-0',
  namespace: 'default',
  localPort: 19092,
  remotePort: 9092,
  state: 'RELAYING',
  retryCount: 0,
};

describe('render', () => {
  describe('formatReadiness', () => {
    it('names the resolved unit when it differs from the target', () => {
      const line = formatReadiness('kafka', {
        ready: true,
        satisfiedBy: 'api-versions',
        elapsedMs: 1500,
        unit: 'kafka-1',
        passes: 1,
      });

      expect(line).toBe('Ready: kafka (kafka-1) satisfied by api-versions after 1.5s');
    });

    it('omits the unit when it is the target', () => {
      const line = formatReadiness('kafka-0', {
        ready: true,
        satisfiedBy: 'log-pattern',
        elapsedMs: 0,
        unit: 'kafka-0',
        passes: 1,
      });

      expect(line).toBe('Ready: kafka-0 satisfied by log-pattern after 0.0s');
    });

    it('reports a missing target', () => {
      const line = formatReadiness('kafka-9', {
        ready: false,
        satisfiedBy: null,
        elapsedMs: 0,
        unit: null,
        passes: 0,
        reason: 'not-found',
      });

      expect(line).toBe('Not found: kafka-9');
    });

    it('reports a timeout with the pass count', () => {
      const line = formatReadiness('kafka-0', {
        ready: false,
        satisfiedBy: null,
        elapsedMs: 60000,
        unit: 'kafka-0',
        passes: 12,
        reason: 'timeout',
      });

      expect(line).toBe('Timed out: kafka-0 not ready after 60.0s (12 passes)');
    });
  });

  describe('formatTunnel', () => {
    it('describes a relaying tunnel', () => {
      expect(formatTunnel(base)).toBe('Forwarding localhost:19092 -> default/kafka-0:9092');
    });

    it('mentions earlier reconnects', () => {
      expect(formatTunnel({ ...base, retryCount: 2 })).toBe(
        'Forwarding localhost:19092 -> default/kafka-0:9092 (reconnected 2x)',
      );
    });

    it('describes a reconnect in progress', () => {
      expect(formatTunnel({ ...base, state: 'RECONNECTING', retryCount: 1 })).toBe(
        'Reconnecting localhost:19092 -> default/kafka-0:9092 (attempt 1)',
      );
    });

    it('includes the last error of a failed tunnel', () => {
      const snapshot: TunnelSnapshot = {
        ...base,
        state: 'FAILED',
        retryCount: 3,
        lastError: { code: 'RETRY_EXHAUSTED', message: 'Relay failed after 3 reconnect attempts' },
      };

      expect(formatTunnel(snapshot)).toBe(
        'Failed localhost:19092 -> default/kafka-0:9092: Relay failed after 3 reconnect attempts',
      );
    });

    it('falls back to the state name', () => {
      expect(formatTunnel({ ...base, state: 'BINDING' })).toBe('BINDING localhost:19092 -> default/kafka-0:9092');
    });
  });
});
