import { describe, it, expect } from '@jest/globals';
import { checkDockerHealth, checkKubernetesHealth, summarizeHealth } from '@/lib/health-checks';
import { silentLogger } from '../../__support__/utilities/net-helpers';

describe('health checks', () => {
  const logger = silentLogger();

  it('reports a reachable daemon as available', async () => {
    await expect(checkDockerHealth({ ping: async () => true }, logger)).resolves.toEqual({
      available: true,
      detail: 'connected',
    });
  });

  it('reports a failed ping', async () => {
    await expect(checkKubernetesHealth({ ping: async () => false }, logger)).resolves.toEqual({
      available: false,
      error: 'Unable to reach Kubernetes cluster',
    });
  });

  it('reports a ping that throws', async () => {
    const client = {
      ping: async (): Promise<boolean> => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:6443');
      },
    };

    await expect(checkKubernetesHealth(client, logger)).resolves.toEqual({
      available: false,
      error: 'connect ECONNREFUSED 127.0.0.1:6443',
    });
  });

  it('gives up on a ping that never answers', async () => {
    const client = { ping: () => new Promise<boolean>(() => undefined) };

    await expect(checkDockerHealth(client, logger, { timeout: 10 })).resolves.toEqual({
      available: false,
      error: 'Docker daemon health check timed out after 10ms',
    });
  });

  describe('summarizeHealth', () => {
    it('is healthy when every dependency is available', () => {
      const dependencies = { docker: { available: true, detail: 'connected' } };

      expect(summarizeHealth(dependencies)).toEqual({ status: 'healthy', dependencies });
    });

    it('is degraded when one dependency is down', () => {
      const report = summarizeHealth({
        docker: { available: true },
        kubernetes: { available: false, error: 'forbidden' },
      });

      expect(report.status).toBe('degraded');
    });

    it('is degraded when nothing was checked', () => {
      expect(summarizeHealth({}).status).toBe('degraded');
    });
  });
});
