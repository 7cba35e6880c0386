import { describe, it, expect } from '@jest/globals';
import { createDockerRuntime, labelFilters } from '@/infra/docker/runtime';
import type { ListContainersOptions } from '@/infra/docker/client';
import { Failure, Success } from '@/types';
import { createFakeDockerClient } from '../../../__support__/fakes/docker-client';

const containers = [
  {
    Id: 'aaa111',
    Names: ['/kafka-0'],
    Image: 'apache/kafka:3.7.0',
    State: 'running',
    Status: 'Up 5 minutes (healthy)',
    Labels: { app: 'kafka' },
  },
  {
    Id: 'bbb222',
    Names: ['/kafka-1'],
    Image: 'apache/kafka:3.7.0',
    State: 'running',
    Status: 'Up 3 seconds (health: starting)',
    Labels: { app: 'kafka' },
  },
  {
    Id: 'ccc333',
    Names: [],
    Image: 'apache/kafka:3.7.0',
    State: 'exited',
    Status: 'Exited (1) 2 minutes ago',
    Labels: { app: 'kafka' },
  },
];

describe('Docker runtime', () => {
  describe('labelFilters', () => {
    it('splits a comma-separated selector and drops empty parts', () => {
      expect(labelFilters('app=kafka, tier=broker,')).toEqual(['app=kafka', 'tier=broker']);
    });
  });

  describe('list', () => {
    it('maps containers to units and filters by label', async () => {
      const seen: ListContainersOptions[] = [];
      const runtime = createDockerRuntime(
        createFakeDockerClient({
          listContainers: async (options = {}) => {
            seen.push(options);
            return Success(containers);
          },
        }),
      );

      const result = await runtime.list('default', 'app=kafka,tier=broker');

      expect(seen).toEqual([{ all: true, filters: { label: ['app=kafka', 'tier=broker'] } }]);
      expect(result).toEqual({
        ok: true,
        value: [
          { name: 'kafka-0', namespace: 'default', phase: 'running', ready: true },
          { name: 'kafka-1', namespace: 'default', phase: 'running', ready: false },
          { name: 'ccc333', namespace: 'default', phase: 'exited', ready: false },
        ],
      });
    });

    it('passes a listing failure through', async () => {
      const runtime = createDockerRuntime(
        createFakeDockerClient({ listContainers: async () => Failure('daemon unavailable') }),
      );

      const result = await runtime.list('default', 'app=kafka');

      expect(result).toEqual({ ok: false, error: 'daemon unavailable' });
    });
  });

  describe('get', () => {
    it('is not ready while the health check reports unhealthy', async () => {
      const runtime = createDockerRuntime(
        createFakeDockerClient({
          getContainer: async (name) =>
            Success({ id: 'aaa111', name, state: 'running', running: true, health: 'unhealthy' }),
        }),
      );

      const result = await runtime.get('default', 'kafka-0');

      expect(result).toEqual({
        ok: true,
        value: { name: 'kafka-0', namespace: 'default', phase: 'running', ready: false },
      });
    });

    it('is ready when running without a health check', async () => {
      const runtime = createDockerRuntime(
        createFakeDockerClient({
          getContainer: async (name) => Success({ id: 'aaa111', name, state: 'running', running: true }),
        }),
      );

      const result = await runtime.get('default', 'kafka-0');

      expect(result.ok && result.value?.ready).toBe(true);
    });

    it('returns null for a missing container', async () => {
      const runtime = createDockerRuntime(createFakeDockerClient());

      expect(await runtime.get('default', 'kafka-9')).toEqual({ ok: true, value: null });
    });
  });

  describe('exec and logs', () => {
    it('forwards exec to the container', async () => {
      const calls: Array<{ name: string; command: string[]; timeoutMs: number | undefined }> = [];
      const runtime = createDockerRuntime(
        createFakeDockerClient({
          execInContainer: async (name, command, timeoutMs) => {
            calls.push({ name, command, timeoutMs });
            return Success('ok');
          },
        }),
      );

      const result = await runtime.exec('ignored', 'kafka-0', ['kafka-topics.sh', '--list'], 3000);

      expect(result).toEqual({ ok: true, value: 'ok' });
      expect(calls).toEqual([{ name: 'kafka-0', command: ['kafka-topics.sh', '--list'], timeoutMs: 3000 }]);
    });

    it('maps tailLines to the docker tail option', async () => {
      const calls: Array<{ name: string; options: { tail?: number } | undefined }> = [];
      const runtime = createDockerRuntime(
        createFakeDockerClient({
          getContainerLogs: async (name, options) => {
            calls.push({ name, options });
            return Success('started');
          },
        }),
      );

      await runtime.logs('default', 'kafka-0', { tailLines: 20 });
      await runtime.logs('default', 'kafka-0');

      expect(calls).toEqual([
        { name: 'kafka-0', options: { tail: 20 } },
        { name: 'kafka-0', options: {} },
      ]);
    });
  });
});
